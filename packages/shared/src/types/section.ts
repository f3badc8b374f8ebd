import type { Block, HeadingBlock, ListItemBlock } from "./block";
import type { TocEntry } from "./toc";

export interface ContentSection {
  readonly role: "content";
  readonly level: number;
  /** `null` for a synthesized section without a source heading. */
  readonly heading: HeadingBlock | null;
  readonly blocks: Block[];
  readonly children: ContentSection[];
}

export interface TocSection {
  readonly role: "toc";
  readonly level: 1;
  readonly heading: HeadingBlock;
  /** `blocks[i]` draws `entries[i]`. */
  readonly blocks: ListItemBlock[];
  readonly entries: readonly TocEntry[];
}

export type Section = ContentSection | TocSection;
