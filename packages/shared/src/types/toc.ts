import type { HeadingBlock } from "./block";

export interface TocEntry {
  readonly text: string;
  readonly level: number;
  /** Content page the heading starts on, 0-based. */
  readonly pageIndex: number;
  readonly heading: HeadingBlock;
}
