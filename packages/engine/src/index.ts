export {
  bodyLineHeight,
  type ContentArea,
  contentArea,
  createRenderConfig,
  DEFAULT_RENDER_CONFIG,
  type RenderConfig,
  type RenderConfigInput,
  RenderConfigInputSchema,
  roundPoints,
  type TocPageNumbering,
} from "./config";
export {
  EngineError,
  isEngineError,
  RenderConfigError,
  ReportInputError,
  type ValidationIssue,
} from "./errors";
export {
  baseFace,
  breakIntoLines,
  EMPTY_LINE,
  faceFor,
  layoutBlock,
  lineText,
} from "./layout/lines";
export {
  createFontMeasurer,
  createPdfMeasurer,
  embedFonts,
  type FaceKey,
  faceKey,
  type FontSet,
  sanitizeForFont,
  type TextMeasurer,
} from "./layout/measure";
export {
  paginate,
  paginateBlocks,
  type PaginateOptions,
} from "./layout/paginate";
export { createStderrLogger, type LoggerMethods, silentLogger } from "./logger";
export {
  contentSections,
  DocumentBuilder,
  findTocSection,
  flattenBlocks,
  headingBlocks,
  sectionTitle,
} from "./model/document";
export { normalizeSource, type ParseOptions, parseMarkdown } from "./parser/blocks";
export { inlineText, parseInline } from "./parser/inline";
export { detectTone } from "./parser/tone";
export {
  type Outline,
  type OutlineEntry,
  type OutlineOptions,
  outlineMarkdown,
  type RenderMarkdownOptions,
  type RenderReportOptions,
  renderMarkdown,
  renderReport,
} from "./pipeline";
export {
  layoutToc,
  MAX_TOC_PASSES,
  type RenderOptions,
  type RenderResult,
  renderDocument,
  type TocLabeler,
  type TocLayout,
  toRoman,
} from "./render/renderer";
export {
  type ComposedReport,
  type ComposeReportOptions,
  composeReport,
  DEFAULT_REPORT_TITLE,
  demoteHeadings,
  displaySource,
  EMPTY_BODY,
  formatPublished,
  mapOutsideFences,
  NewsRecordSchema,
  stripHtml,
} from "./report/compose";
export { resolveStyle, resolveStyles } from "./style/resolver";
export { buildToc } from "./toc/builder";
