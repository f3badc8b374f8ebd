import type { InlineRun } from "./inline";
import type { PageAssignment } from "./layout";
import type { Style } from "./style";

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type ListMarker = "ordered" | "unordered";

export type ParagraphTone =
  | "general"
  | "executive-summary"
  | "background"
  | "objective"
  | "methodology"
  | "research-areas"
  | "timeline"
  | "investment"
  | "deliverable";

interface BlockBase {
  /** Set by the style pass; `null` until then. */
  style: Style | null;
  /** Set by the pagination pass; `null` until then. */
  assignment: PageAssignment | null;
}

export interface HeadingBlock extends BlockBase {
  readonly kind: "heading";
  readonly level: HeadingLevel;
  readonly text: string;
}

export interface ParagraphBlock extends BlockBase {
  readonly kind: "paragraph";
  readonly runs: InlineRun;
  readonly tone: ParagraphTone;
}

export interface ListItemBlock extends BlockBase {
  readonly kind: "listItem";
  readonly marker: ListMarker;
  /** Source number of an ordered item, `null` for bullets. */
  readonly ordinal: number | null;
  readonly depth: number;
  /** Consecutive list lines of one marker family share a group. */
  readonly group: number;
  readonly runs: InlineRun;
}

export interface QuoteBlock extends BlockBase {
  readonly kind: "quote";
  readonly depth: number;
  readonly runs: InlineRun;
}

export interface CodeBlock extends BlockBase {
  readonly kind: "code";
  readonly language: string | null;
  readonly lines: readonly string[];
}

export interface RuleBlock extends BlockBase {
  readonly kind: "rule";
}

export type Block =
  | HeadingBlock
  | ParagraphBlock
  | ListItemBlock
  | QuoteBlock
  | CodeBlock
  | RuleBlock;

export type BlockKind = Block["kind"];
