import type { DocumentMetadata, NewsRecord } from "@newsdoc/shared";
import { z } from "zod";
import { ReportInputError } from "../errors";
import { normalizeSource } from "../parser/blocks";
import { closesFence, type FenceLine, fenceFromLine } from "../parser/shared";

export const NewsRecordSchema: z.ZodType<NewsRecord> = z
  .object({
    source: z.string().trim().min(1),
    title: z.string().trim().min(1),
    publishedAt: z.string().trim().min(1),
    url: z.string().url().optional(),
    bodyMarkdown: z.string(),
  })
  .strict();

const NewsRecordListSchema = z
  .array(NewsRecordSchema)
  .min(1, "at least one news record is required");

export interface ComposeReportOptions {
  readonly title?: string;
  /** Display names keyed by source, e.g. `{ coindesk: "CoinDesk" }`. */
  readonly sourceNames?: Readonly<Record<string, string>>;
  readonly generatedAt?: Date;
}

export interface ComposedReport {
  readonly markdown: string;
  readonly metadata: DocumentMetadata;
}

export const DEFAULT_REPORT_TITLE = "News Report";
export const EMPTY_BODY = "No summary available.";

/** Body headings sit this many levels below the record heading's level. */
const HEADING_DEMOTION = 2;

const HTML_TAG_PATTERN = /<!--[\s\S]*?-->|<\/?[A-Za-z][A-Za-z0-9-]*(?:\s[^<>]*)?\/?>/g;
const HTML_ENTITY_PATTERN = /&(?:amp|lt|gt|quot|#39|nbsp);/g;
const CODE_SPAN_PATTERN = /(`+[^`]*`+)/;

const HTML_ENTITIES: Readonly<Record<string, string>> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&nbsp;": " ",
};

const DATE_FORMAT = new Intl.DateTimeFormat("en-US", {
  year: "numeric",
  month: "long",
  day: "numeric",
  timeZone: "UTC",
});

/**
 * Builds one markdown report out of news records: a level-1 section per
 * source in first-seen order and a level-2 section per record.
 */
export function composeReport(
  records: readonly unknown[],
  options: ComposeReportOptions = {},
): ComposedReport {
  const parsed = NewsRecordListSchema.safeParse(records);
  if (!parsed.success) {
    throw new ReportInputError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
      parsed.error,
    );
  }

  const bySource = new Map<string, NewsRecord[]>();
  for (const record of parsed.data) {
    const group = bySource.get(record.source);
    if (group) {
      group.push(record);
    } else {
      bySource.set(record.source, [record]);
    }
  }

  const parts: string[] = [];
  for (const [source, group] of bySource) {
    parts.push(`# ${options.sourceNames?.[source] ?? displaySource(source)}`);
    for (const record of group) {
      parts.push(...recordSection(record));
    }
  }

  return {
    markdown: `${parts.join("\n\n")}\n`,
    metadata: {
      title: options.title ?? DEFAULT_REPORT_TITLE,
      subtitle: `Generated on ${formatDate(options.generatedAt ?? new Date())}`,
    },
  };
}

function recordSection(record: NewsRecord): string[] {
  const lines = [
    `## ${record.title.replace(/\s+/g, " ")}`,
    `Published: ${formatPublished(record.publishedAt)}`,
  ];
  if (record.url) {
    lines.push(`Link: [${record.url}](${record.url})`);
  }
  lines.push(recordBody(record.bodyMarkdown));
  return lines;
}

/**
 * Summaries arrive with escaped newlines, feed HTML and unterminated fences.
 * Each body is unescaped on its own, stripped of tags, demoted, and closes
 * whatever fence it opened so the next record's headings stay headings.
 */
function recordBody(raw: string): string {
  const body = mapOutsideFences(normalizeSource(raw), stripHtml).trim();
  return body.length > 0 ? demoteHeadings(body, HEADING_DEMOTION) : EMPTY_BODY;
}

/** `crypto_news-daily` becomes `Crypto News Daily`. */
export function displaySource(source: string): string {
  return source
    .split(/[_\-\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

/** Formats a parseable timestamp as `May 1, 2024`; anything else is kept. */
export function formatPublished(raw: string): string {
  const parsed = new Date(raw);
  return Number.isNaN(parsed.getTime()) ? raw : formatDate(parsed);
}

function formatDate(date: Date): string {
  return DATE_FORMAT.format(date);
}

/**
 * Pushes every ATX heading outside code fences `by` levels deeper, stopping
 * at level 6.
 */
export function demoteHeadings(markdown: string, by: number): string {
  return mapOutsideFences(markdown, (line) =>
    line.replace(
      /^( {0,3})(#{1,6})(?=\s|$)/,
      (_match, indent: string, hashes: string) =>
        indent + "#".repeat(Math.min(hashes.length + by, 6)),
    ),
  );
}

/** Drops inline HTML tags and decodes common entities, leaving code spans alone. */
export function stripHtml(line: string): string {
  return line
    .split(CODE_SPAN_PATTERN)
    .map((part, index) =>
      index % 2 === 1
        ? part
        : part
            .replace(HTML_TAG_PATTERN, "")
            .replace(HTML_ENTITY_PATTERN, (entity) => HTML_ENTITIES[entity] ?? entity),
    )
    .join("");
}

/**
 * Applies `transform` to every line outside code fences. A fence still open
 * at the end gets a closing line.
 */
export function mapOutsideFences(
  markdown: string,
  transform: (line: string) => string,
): string {
  let fence: FenceLine | null = null;
  const lines: string[] = [];
  for (const line of markdown.split("\n")) {
    if (fence) {
      if (closesFence(line, fence)) {
        fence = null;
      }
      lines.push(line);
      continue;
    }
    const opening = fenceFromLine(line);
    if (opening) {
      fence = opening;
      lines.push(line);
      continue;
    }
    lines.push(transform(line));
  }

  if (fence) {
    lines.push(fence.marker);
  }
  return lines.join("\n");
}
