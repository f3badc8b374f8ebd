import type { Document, DocumentMetadata } from "@newsdoc/shared";
import { createRenderConfig, type RenderConfig } from "./config";
import { createPdfMeasurer, type TextMeasurer } from "./layout/measure";
import { paginate } from "./layout/paginate";
import { silentLogger, type LoggerMethods } from "./logger";
import { parseMarkdown } from "./parser/blocks";
import { type ComposeReportOptions, composeReport } from "./report/compose";
import { renderDocument, type RenderResult } from "./render/renderer";
import { resolveStyles } from "./style/resolver";
import { buildToc } from "./toc/builder";

export interface RenderMarkdownOptions {
  /** Raw configuration input; validated before any pass runs. */
  readonly config?: unknown;
  readonly metadata?: DocumentMetadata;
  readonly measurer?: TextMeasurer;
  readonly logger?: LoggerMethods;
  readonly createdAt?: Date;
}

export type RenderReportOptions = Omit<RenderMarkdownOptions, "metadata"> &
  ComposeReportOptions;

export type OutlineOptions = Pick<
  RenderMarkdownOptions,
  "config" | "measurer" | "logger"
>;

export interface OutlineEntry {
  readonly text: string;
  readonly level: number;
  /** 1-based content page number. */
  readonly page: number;
}

export interface Outline {
  readonly entries: readonly OutlineEntry[];
  readonly contentPageCount: number;
}

/** Each source group of a report opens on a new page unless configured otherwise. */
const REPORT_CONFIG_DEFAULTS = { pageBreakBeforeLevel: 1 } as const;

interface PreparedDocument {
  readonly document: Document;
  readonly config: RenderConfig;
  readonly measurer: TextMeasurer;
  readonly logger: LoggerMethods;
}

async function prepareDocument(
  markdown: string,
  options: OutlineOptions,
): Promise<PreparedDocument> {
  const config = createRenderConfig(options.config);
  const logger = options.logger ?? silentLogger;
  const measurer = options.measurer ?? (await createPdfMeasurer());

  const document = parseMarkdown(markdown, { logger });
  resolveStyles(document, config);
  paginate(document, config, measurer, { logger });
  buildToc(document, config);
  logger.debug(
    `[Pipeline] ${document.pages?.length ?? 0} content pages, ${document.toc?.length ?? 0} TOC entries`,
  );
  return { document, config, measurer, logger };
}

/** Parses, styles, paginates, indexes and draws one markdown document. */
export async function renderMarkdown(
  markdown: string,
  options: RenderMarkdownOptions = {},
): Promise<RenderResult> {
  const { document, config, measurer, logger } = await prepareDocument(
    markdown,
    options,
  );

  return renderDocument(document, {
    config,
    measurer,
    metadata: options.metadata,
    logger,
    createdAt: options.createdAt,
  });
}

/** Composes news records into one report and renders it with a title page. */
export async function renderReport(
  records: readonly unknown[],
  options: RenderReportOptions = {},
): Promise<RenderResult> {
  const config = withReportDefaults(options.config);
  // configuration errors take precedence over record errors
  createRenderConfig(config);
  const { markdown, metadata } = composeReport(records, {
    title: options.title,
    sourceNames: options.sourceNames,
    generatedAt: options.generatedAt ?? options.createdAt,
  });
  return renderMarkdown(markdown, {
    config,
    measurer: options.measurer,
    logger: options.logger,
    createdAt: options.createdAt,
    metadata,
  });
}

function withReportDefaults(config: unknown): unknown {
  if (config === undefined || config === null) {
    return REPORT_CONFIG_DEFAULTS;
  }
  if (typeof config !== "object" || Array.isArray(config)) {
    return config;
  }
  return { ...REPORT_CONFIG_DEFAULTS, ...config };
}

/** The TOC a rendering would print, without drawing anything. */
export async function outlineMarkdown(
  markdown: string,
  options: OutlineOptions = {},
): Promise<Outline> {
  const { document } = await prepareDocument(markdown, options);
  return {
    entries: (document.toc ?? []).map((entry) => ({
      text: entry.text,
      level: entry.level,
      page: entry.pageIndex + 1,
    })),
    contentPageCount: document.pages?.length ?? 0,
  };
}
