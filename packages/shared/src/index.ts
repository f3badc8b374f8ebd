export {
  ERROR_CODES,
  type ErrorCode,
  PAGE_SIZE_NAMES,
  PAGE_SIZES,
  type PageSizeName,
} from "./contracts";
export type {
  Block,
  BlockKind,
  CodeBlock,
  HeadingBlock,
  HeadingLevel,
  ListItemBlock,
  ListMarker,
  ParagraphBlock,
  ParagraphTone,
  QuoteBlock,
  RuleBlock,
} from "./types/block";
export type { Document, DocumentMetadata } from "./types/document";
export type { InlineRun, InlineSpan, InlineSpanKind } from "./types/inline";
export type {
  LayoutLine,
  LineRun,
  Page,
  PageAssignment,
  PageFragment,
  PageGeometry,
} from "./types/layout";
export type { NewsRecord } from "./types/record";
export type { ContentSection, Section, TocSection } from "./types/section";
export type {
  FontFace,
  FontFamily,
  FontStyle,
  FontWeight,
  Style,
} from "./types/style";
export type { TocEntry } from "./types/toc";
