import type { Block } from "./block";
import type { FontFace } from "./style";

export interface PageGeometry {
  readonly width: number;
  readonly height: number;
  readonly margins: {
    readonly top: number;
    readonly right: number;
    readonly bottom: number;
    readonly left: number;
  };
}

export interface LineRun {
  readonly text: string;
  readonly face: FontFace;
  readonly width: number;
  readonly link: string | null;
}

export interface LayoutLine {
  readonly runs: readonly LineRun[];
  readonly width: number;
}

export interface PageAssignment {
  /** 0-based index among content pages. */
  readonly pageIndex: number;
  /** Distance from the top of the content area to the block's first line. */
  readonly offset: number;
  /** Total rendered height over every fragment of the block. */
  readonly height: number;
}

export interface PageFragment {
  readonly block: Block;
  readonly lines: readonly LayoutLine[];
  /** Index of `lines[0]` within the block's full line layout. */
  readonly firstLine: number;
  readonly offset: number;
  readonly height: number;
  readonly continuation: boolean;
  /** The fragment runs past the bottom of the content area. */
  readonly overflow: boolean;
}

export interface Page {
  readonly index: number;
  readonly fragments: PageFragment[];
}
