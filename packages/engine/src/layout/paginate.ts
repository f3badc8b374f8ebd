import type {
  Block,
  Document,
  LayoutLine,
  Page,
  PageAssignment,
} from "@newsdoc/shared";
import { bodyLineHeight, contentArea, type RenderConfig } from "../config";
import { silentLogger, type LoggerMethods } from "../logger";
import { flattenBlocks } from "../model/document";
import { layoutBlock } from "./lines";
import type { TextMeasurer } from "./measure";

const EPSILON = 1e-6;

export interface PaginateOptions {
  /** Width kept free at the right of the column, e.g. for TOC page labels. */
  readonly rightInset?: number;
  readonly logger?: LoggerMethods;
}

function isSplittable(block: Block): boolean {
  return block.kind === "paragraph" || block.kind === "code";
}

function startsPage(block: Block, config: RenderConfig): boolean {
  return (
    block.kind === "heading" &&
    config.pageBreakBeforeLevel !== null &&
    block.level <= config.pageBreakBeforeLevel
  );
}

/**
 * Places styled blocks on pages in order and records each block's
 * assignment. Paragraphs and code blocks split between lines; everything
 * else moves to the next page whole. A block that does not fit on an empty
 * page is placed anyway and its fragment is flagged as overflowing. Headings
 * at or above `pageBreakBeforeLevel` always open a fresh page.
 */
export function paginateBlocks(
  blocks: readonly Block[],
  config: RenderConfig,
  measurer: TextMeasurer,
  options: PaginateOptions = {},
): Page[] {
  const logger = options.logger ?? silentLogger;
  const area = contentArea(config);
  const columnWidth = Math.max(area.width - (options.rightInset ?? 0), 0);
  const headingRoom = bodyLineHeight(config);

  const pages: Page[] = [];
  let page: Page | null = null;
  let cursor = 0;

  const currentPage = (): Page => {
    if (!page) {
      page = { index: pages.length, fragments: [] };
      pages.push(page);
    }
    return page;
  };

  const breakPage = () => {
    currentPage();
    page = null;
    cursor = 0;
  };

  blocks.forEach((block, blockIndex) => {
    const style = block.style;
    if (!style) {
      throw new Error(
        `block ${blockIndex} (${block.kind}) has no style; resolve styles before paginating`,
      );
    }

    if (startsPage(block, config) && cursor > 0) {
      breakPage();
    }

    const lines = layoutBlock(block, style, columnWidth, measurer);
    const lineHeight = style.lineHeight;
    let placed = 0;
    const span: { start: PageAssignment | null; height: number } = {
      start: null,
      height: 0,
    };

    const place = (slice: LayoutLine[], before: number, overflow: boolean) => {
      const target = currentPage();
      const offset = cursor + before;
      const height = slice.length * lineHeight;
      target.fragments.push({
        block,
        lines: slice,
        firstLine: placed,
        offset,
        height,
        continuation: placed > 0,
        overflow,
      });
      span.start ??= { pageIndex: target.index, offset, height: 0 };
      span.height += height;
      placed += slice.length;
      cursor = offset + height;
    };

    while (placed < lines.length) {
      const remaining = lines.slice(placed);
      const before = placed === 0 && cursor > 0 ? style.spaceBefore : 0;
      const available = area.height - cursor - before;
      const reserve = block.kind === "heading" && cursor > 0 ? headingRoom : 0;
      const height = remaining.length * lineHeight;

      if (height + reserve <= available + EPSILON) {
        place(remaining, before, false);
        break;
      }

      const fitting = Math.floor((available + EPSILON) / lineHeight);
      if (isSplittable(block) && fitting >= 1) {
        place(remaining.slice(0, fitting), before, false);
        breakPage();
        continue;
      }

      if (cursor > 0) {
        breakPage();
        continue;
      }

      logger.warn(
        `[Paginator] ${block.kind} block needs ${height}pt but a page holds ${area.height}pt; placing it overflowing`,
      );
      place(remaining, before, true);
    }

    cursor += style.spaceAfter;
    if (span.start) {
      block.assignment = { ...span.start, height: span.height };
    }
  });

  logger.debug(
    `[Paginator] placed ${blocks.length} blocks on ${pages.length} pages`,
  );
  return pages;
}

/** Paginates the content sections and stores the pages on the document. */
export function paginate(
  document: Document,
  config: RenderConfig,
  measurer: TextMeasurer,
  options: Pick<PaginateOptions, "logger"> = {},
): Document {
  document.pages = paginateBlocks(
    flattenBlocks(document),
    config,
    measurer,
    options,
  );
  return document;
}
