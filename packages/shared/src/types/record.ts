/** One item handed over by the feed and AI collaborators. */
export interface NewsRecord {
  readonly source: string;
  readonly title: string;
  /** Publication timestamp as received (RFC 2822, ISO 8601 or free text). */
  readonly publishedAt: string;
  readonly url?: string;
  readonly bodyMarkdown: string;
}
