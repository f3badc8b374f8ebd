import type { Page } from "./layout";
import type { Section } from "./section";
import type { TocEntry } from "./toc";

export interface Document {
  readonly sections: Section[];
  /** Content pages, filled in by pagination. */
  pages: Page[] | null;
  /** Filled in by the TOC pass. */
  toc: readonly TocEntry[] | null;
}

export interface DocumentMetadata {
  readonly title: string;
  readonly subtitle?: string;
  readonly author?: string;
}
