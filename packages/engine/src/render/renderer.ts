import type {
  Block,
  Document,
  DocumentMetadata,
  FontFace,
  LayoutLine,
  Page,
  PageFragment,
  Style,
  TocEntry,
  TocSection,
} from "@newsdoc/shared";
import { PDFDocument, type PDFPage, rgb, type RGB } from "pdf-lib";
import { contentArea, type ContentArea, type RenderConfig } from "../config";
import { baseFace, breakIntoLines } from "../layout/lines";
import {
  createFontMeasurer,
  embedFonts,
  faceKey,
  type FontSet,
  sanitizeForFont,
  type TextMeasurer,
} from "../layout/measure";
import { paginateBlocks } from "../layout/paginate";
import { silentLogger, type LoggerMethods } from "../logger";
import { findTocSection, headingBlocks } from "../model/document";
import { addPageLink, addUriLink } from "./annotations";

/** Upper bound on TOC layout passes while its page count settles. */
export const MAX_TOC_PASSES = 2;

const PRODUCER = "newsdoc";
const LABEL_GAP = 12;
const MARKER_GAP = 6;
const FOOTER_SIZE = 9;
const FOOTER_COLOR = "#6B7280";
const LINK_COLOR = "#2563EB";
const QUOTE_BAR_COLOR = "#C7D2FE";
const CODE_BACKGROUND = "#F3F4F6";
const TITLE_COLOR = "#111827";
const SUBTITLE_COLOR = "#4B5563";

const SANS: FontFace = { family: "sans", weight: "normal", style: "normal" };

export interface RenderOptions {
  readonly config: RenderConfig;
  /** Defaults to the metrics of the fonts embedded in the output. */
  readonly measurer?: TextMeasurer;
  /** Adds a title page and fills the PDF info dictionary. */
  readonly metadata?: DocumentMetadata;
  readonly logger?: LoggerMethods;
  readonly createdAt?: Date;
}

export interface RenderResult {
  readonly bytes: Uint8Array;
  readonly pageCount: number;
  readonly frontPageCount: number;
  readonly tocPageCount: number;
  readonly contentPageCount: number;
  /** TOC layout passes run before the page count settled or the cap hit. */
  readonly tocPasses: number;
  readonly converged: boolean;
}

export interface TocLayout {
  readonly pages: Page[];
  readonly passes: number;
  readonly converged: boolean;
  /** Width kept free for the page labels, gap included. */
  readonly rightInset: number;
}

export type TocLabeler = (entry: TocEntry, tocPageCount: number) => string;

interface DrawContext {
  readonly config: RenderConfig;
  readonly area: ContentArea;
  readonly fonts: FontSet;
  readonly measurer: TextMeasurer;
}

/**
 * Draws a paginated document with its TOC: the optional title page, then the
 * TOC pages, then the content pages.
 */
export async function renderDocument(
  document: Document,
  options: RenderOptions,
): Promise<RenderResult> {
  const { config, metadata } = options;
  const logger = options.logger ?? silentLogger;
  const contentPages = document.pages;
  if (!contentPages) {
    throw new Error("document has no pages; paginate before rendering");
  }
  const toc = findTocSection(document);
  if (!toc) {
    throw new Error("document has no TOC section; build the TOC before rendering");
  }

  const pdf = await PDFDocument.create();
  const fonts = await embedFonts(pdf);
  const context: DrawContext = {
    config,
    area: contentArea(config),
    fonts,
    measurer: options.measurer ?? createFontMeasurer(fonts),
  };
  const frontPageCount = metadata ? 1 : 0;

  const labelFor: TocLabeler = (entry, tocPageCount) =>
    pageLabel(entry.pageIndex, config, frontPageCount + tocPageCount);
  const tocLayout = layoutToc(toc, config, context.measurer, labelFor, logger);
  const tocPageCount = tocLayout.pages.length;

  const size: [number, number] = [config.geometry.width, config.geometry.height];
  const front = metadata ? [pdf.addPage(size)] : [];
  const tocTargets = tocLayout.pages.map(() => pdf.addPage(size));
  const contentTargets = contentPages.map(() => pdf.addPage(size));

  const [titlePage] = front;
  if (titlePage && metadata) {
    drawTitlePage(titlePage, metadata, context);
  }

  const entryByBlock = new Map<Block, TocEntry>();
  toc.blocks.forEach((block, index) => {
    const entry = toc.entries[index];
    if (entry) {
      entryByBlock.set(block, entry);
    }
  });

  tocLayout.pages.forEach((page, index) => {
    const target = tocTargets[index];
    if (!target) {
      return;
    }
    for (const fragment of page.fragments) {
      drawFragment(target, fragment, context, { markers: false });
      const entry = entryByBlock.get(fragment.block);
      if (entry) {
        drawTocLabel(
          target,
          fragment,
          labelFor(entry, tocPageCount),
          contentTargets[entry.pageIndex],
          entry,
          context,
        );
      }
    }
    drawFooter(target, toRoman(index + 1), context);
  });

  contentPages.forEach((page, index) => {
    const target = contentTargets[index];
    if (!target) {
      return;
    }
    for (const fragment of page.fragments) {
      drawFragment(target, fragment, context, { markers: true });
    }
    drawFooter(
      target,
      pageLabel(index, config, frontPageCount + tocPageCount),
      context,
    );
  });

  const createdAt = options.createdAt ?? new Date();
  const [firstHeading] = headingBlocks(document);
  pdf.setTitle(metadata?.title ?? firstHeading?.text ?? "Untitled document");
  if (metadata?.subtitle) {
    pdf.setSubject(metadata.subtitle);
  }
  if (metadata?.author) {
    pdf.setAuthor(metadata.author);
  }
  pdf.setCreator(PRODUCER);
  pdf.setProducer(PRODUCER);
  pdf.setCreationDate(createdAt);
  pdf.setModificationDate(createdAt);

  const bytes = await pdf.save();
  const pageCount = pdf.getPageCount();
  logger.info(
    `[Renderer] rendered ${pageCount} pages (${frontPageCount} front, ${tocPageCount} TOC, ${contentPages.length} content)`,
  );

  return {
    bytes,
    pageCount,
    frontPageCount,
    tocPageCount,
    contentPageCount: contentPages.length,
    tocPasses: tocLayout.passes,
    converged: tocLayout.converged,
  };
}

/**
 * Lays out the TOC with a right-hand column wide enough for its page labels.
 * Absolute labels shift with the TOC's own length, so the layout is redone
 * until the page count it assumed is the one it produced. The last pass sizes
 * the column for the most pages the TOC can take (one per block), so labels
 * still fit when the count never settles.
 */
export function layoutToc(
  toc: TocSection,
  config: RenderConfig,
  measurer: TextMeasurer,
  labelFor: TocLabeler,
  logger: LoggerMethods = silentLogger,
): TocLayout {
  const blocks: Block[] = [toc.heading, ...toc.blocks];
  const labelSize = config.baseFontSize;
  const dependsOnLength = config.tocPageNumbers === "absolute";

  const insetFor = (counts: readonly number[]) => {
    let widest = 0;
    for (const entry of toc.entries) {
      for (const count of counts) {
        widest = Math.max(
          widest,
          measurer.measure(labelFor(entry, count), SANS, labelSize),
        );
      }
    }
    return widest > 0 ? widest + LABEL_GAP : 0;
  };

  let assumed = 1;
  let passes = 0;
  let pages: Page[] = [];
  let rightInset = 0;

  while (passes < MAX_TOC_PASSES) {
    passes += 1;
    const last = dependsOnLength && passes === MAX_TOC_PASSES;
    rightInset = insetFor(last ? [assumed, blocks.length] : [assumed]);
    pages = paginateBlocks(blocks, config, measurer, { rightInset, logger });
    logger.debug(
      `[Renderer] TOC pass ${passes}: assumed ${assumed} pages, laid out ${pages.length}`,
    );

    if (!dependsOnLength || pages.length === assumed) {
      return { pages, passes, converged: true, rightInset };
    }
    assumed = pages.length;
  }

  logger.warn(
    `[Renderer] TOC page count did not settle after ${MAX_TOC_PASSES} passes; keeping ${pages.length} pages`,
  );
  return { pages, passes, converged: false, rightInset };
}

/** Label of a content page: its content number, or its absolute PDF number. */
function pageLabel(
  contentIndex: number,
  config: RenderConfig,
  pagesBefore: number,
): string {
  const offset = config.tocPageNumbers === "absolute" ? pagesBefore : 0;
  return String(contentIndex + 1 + offset);
}

function drawFragment(
  page: PDFPage,
  fragment: PageFragment,
  context: DrawContext,
  options: { readonly markers: boolean },
): void {
  const { block } = fragment;
  const style = block.style;
  if (!style) {
    throw new Error(`cannot draw an unstyled ${block.kind} block`);
  }
  const { area } = context;
  const top = area.top - fragment.offset;
  const left = area.left + style.indent;

  switch (block.kind) {
    case "rule": {
      const y = top - style.lineHeight / 2;
      page.drawLine({
        start: { x: area.left, y },
        end: { x: area.left + area.width, y },
        thickness: style.lineHeight,
        color: hexColor(style.color),
      });
      return;
    }
    case "code":
      page.drawRectangle({
        x: left - 4,
        y: top - fragment.height,
        width: area.left + area.width - left + 4,
        height: fragment.height,
        color: hexColor(CODE_BACKGROUND),
      });
      break;
    case "quote":
      page.drawRectangle({
        x: left - 8,
        y: top - fragment.height,
        width: 2,
        height: fragment.height,
        color: hexColor(QUOTE_BAR_COLOR),
      });
      break;
    case "listItem":
      if (options.markers && fragment.firstLine === 0) {
        const marker =
          block.marker === "ordered" ? `${block.ordinal ?? 1}.` : "•";
        const face = baseFace(style);
        const width = context.measurer.measure(marker, face, style.fontSize);
        drawText(page, marker, {
          x: left - MARKER_GAP - width,
          y: baseline(top, style),
          face,
          size: style.fontSize,
          color: style.color,
          fonts: context.fonts,
        });
      }
      break;
    case "heading":
    case "paragraph":
      break;
  }

  fragment.lines.forEach((line, index) => {
    drawLayoutLine(page, line, left, top - index * style.lineHeight, style, context);
  });
}

function drawLayoutLine(
  page: PDFPage,
  line: LayoutLine,
  left: number,
  top: number,
  style: Style,
  context: DrawContext,
): void {
  const y = baseline(top, style);
  let x = left;
  for (const run of line.runs) {
    const color = run.link ? LINK_COLOR : style.color;
    drawText(page, run.text, {
      x,
      y,
      face: run.face,
      size: style.fontSize,
      color,
      fonts: context.fonts,
    });
    if (run.link) {
      page.drawLine({
        start: { x, y: y - 1.5 },
        end: { x: x + run.width, y: y - 1.5 },
        thickness: 0.5,
        color: hexColor(LINK_COLOR),
      });
      addUriLink(
        page,
        { x, y: top - style.lineHeight, width: run.width, height: style.lineHeight },
        run.link,
      );
    }
    x += run.width;
  }
}

function drawTocLabel(
  page: PDFPage,
  fragment: PageFragment,
  label: string,
  target: PDFPage | undefined,
  entry: TocEntry,
  context: DrawContext,
): void {
  const style = fragment.block.style;
  if (!style) {
    return;
  }
  const { area, config } = context;
  const top = area.top - fragment.offset;
  const lastLineTop = top - (fragment.lines.length - 1) * style.lineHeight;
  const size = config.baseFontSize;
  const width = context.measurer.measure(label, SANS, size);

  drawText(page, label, {
    x: area.left + area.width - width,
    y: baseline(lastLineTop, style),
    face: SANS,
    size,
    color: style.color,
    fonts: context.fonts,
  });

  const headingOffset = entry.heading.assignment?.offset ?? 0;
  if (target) {
    addPageLink(
      page,
      {
        x: area.left,
        y: top - fragment.height,
        width: area.width,
        height: fragment.height,
      },
      target,
      area.top - headingOffset,
    );
  }
}

function drawTitlePage(
  page: PDFPage,
  metadata: DocumentMetadata,
  context: DrawContext,
): void {
  const { area } = context;
  let top = area.top - area.height / 3;

  const centered = (text: string, style: Style) => {
    const lines = breakIntoLines(
      [{ kind: "plain", text }],
      style,
      area.width,
      context.measurer,
    );
    for (const line of lines) {
      drawLayoutLine(
        page,
        line,
        area.left + (area.width - line.width) / 2,
        top,
        style,
        context,
      );
      top -= style.lineHeight;
    }
  };

  centered(metadata.title, titleStyle(26, "bold", TITLE_COLOR));
  if (metadata.subtitle) {
    top -= 12;
    centered(metadata.subtitle, titleStyle(14, "normal", SUBTITLE_COLOR));
  }
  if (metadata.author) {
    top -= 8;
    centered(metadata.author, titleStyle(12, "normal", SUBTITLE_COLOR));
  }
}

function titleStyle(
  fontSize: number,
  fontWeight: Style["fontWeight"],
  color: string,
): Style {
  return {
    fontFamily: "sans",
    fontWeight,
    fontStyle: "normal",
    fontSize,
    lineHeight: Math.round(fontSize * 1.25),
    color,
    indent: 0,
    spaceBefore: 0,
    spaceAfter: 0,
  };
}

function drawFooter(page: PDFPage, label: string, context: DrawContext): void {
  const { config, measurer } = context;
  const width = measurer.measure(label, SANS, FOOTER_SIZE);
  drawText(page, label, {
    x: (config.geometry.width - width) / 2,
    y: Math.max(config.geometry.margins.bottom / 2 - FOOTER_SIZE / 2, 4),
    face: SANS,
    size: FOOTER_SIZE,
    color: FOOTER_COLOR,
    fonts: context.fonts,
  });
}

interface TextPlacement {
  readonly x: number;
  readonly y: number;
  readonly face: FontFace;
  readonly size: number;
  readonly color: string;
  readonly fonts: FontSet;
}

function drawText(page: PDFPage, text: string, placement: TextPlacement): void {
  if (text.length === 0) {
    return;
  }
  const font = placement.fonts[faceKey(placement.face)];
  page.drawText(sanitizeForFont(text, font), {
    x: placement.x,
    y: placement.y,
    size: placement.size,
    font,
    color: hexColor(placement.color),
  });
}

/** Baseline of a line whose box starts at `top`, with the glyphs centred. */
function baseline(top: number, style: Style): number {
  return top - (style.lineHeight - style.fontSize) / 2 - style.fontSize * 0.8;
}

function hexColor(hex: string): RGB {
  const value = Number.parseInt(hex.replace(/^#/, ""), 16);
  return rgb(
    ((value >> 16) & 0xff) / 255,
    ((value >> 8) & 0xff) / 255,
    (value & 0xff) / 255,
  );
}

const ROMAN_NUMERALS: readonly (readonly [number, string])[] = [
  [1000, "m"],
  [900, "cm"],
  [500, "d"],
  [400, "cd"],
  [100, "c"],
  [90, "xc"],
  [50, "l"],
  [40, "xl"],
  [10, "x"],
  [9, "ix"],
  [5, "v"],
  [4, "iv"],
  [1, "i"],
];

export function toRoman(value: number): string {
  let remaining = value;
  let numeral = "";
  for (const [amount, symbol] of ROMAN_NUMERALS) {
    while (remaining >= amount) {
      numeral += symbol;
      remaining -= amount;
    }
  }
  return numeral;
}
