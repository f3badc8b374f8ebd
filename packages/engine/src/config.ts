import { PAGE_SIZE_NAMES, PAGE_SIZES, type PageGeometry } from "@newsdoc/shared";
import { z } from "zod";
import { RenderConfigError, type ValidationIssue } from "./errors";

export type TocPageNumbering = "content" | "absolute";

export interface RenderConfig {
  readonly geometry: PageGeometry;
  readonly baseFontSize: number;
  /** Line height as a multiple of the font size. */
  readonly lineHeightRatio: number;
  /** Left indent added per list or quote nesting level. */
  readonly indentStep: number;
  /** Deepest heading level listed in the table of contents. */
  readonly tocMaxLevel: number;
  /** Nesting depth past which list and quote indent stops growing. */
  readonly maxNestingDepth: number;
  readonly tocTitle: string;
  readonly tocPageNumbers: TocPageNumbering;
  /** Headings at this level or above start a new page; `null` never forces one. */
  readonly pageBreakBeforeLevel: number | null;
}

export interface ContentArea {
  readonly left: number;
  readonly top: number;
  readonly width: number;
  readonly height: number;
}

const DEFAULT_MARGIN = 50;

const MarginsSchema = z
  .object({
    top: z.number().nonnegative(),
    right: z.number().nonnegative(),
    bottom: z.number().nonnegative(),
    left: z.number().nonnegative(),
  })
  .partial()
  .strict();

export const RenderConfigInputSchema = z
  .object({
    pageSize: z.enum(PAGE_SIZE_NAMES).optional(),
    pageWidth: z.number().positive().finite().optional(),
    pageHeight: z.number().positive().finite().optional(),
    margins: z.union([z.number().nonnegative(), MarginsSchema]).optional(),
    baseFontSize: z.number().positive().max(72).default(11),
    lineHeightRatio: z.number().min(1).max(3).default(1.3),
    indentStep: z.number().nonnegative().default(18),
    tocMaxLevel: z.number().int().min(1).max(6).default(3),
    maxNestingDepth: z.number().int().nonnegative().default(4),
    tocTitle: z.string().trim().min(1).default("Contents"),
    tocPageNumbers: z.enum(["content", "absolute"]).default("content"),
    pageBreakBeforeLevel: z.number().int().min(1).max(6).nullable().default(null),
  })
  .strict();

export type RenderConfigInput = z.input<typeof RenderConfigInputSchema>;

/**
 * Validates `input` and returns a frozen configuration. Throws
 * `RenderConfigError` before any pass runs when the page geometry is unusable.
 */
export function createRenderConfig(input: unknown = {}): RenderConfig {
  const parsed = RenderConfigInputSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new RenderConfigError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
      parsed.error,
    );
  }

  const value = parsed.data;
  const size = PAGE_SIZES[value.pageSize ?? "a4"];
  const margins =
    typeof value.margins === "number"
      ? {
          top: value.margins,
          right: value.margins,
          bottom: value.margins,
          left: value.margins,
        }
      : {
          top: value.margins?.top ?? DEFAULT_MARGIN,
          right: value.margins?.right ?? DEFAULT_MARGIN,
          bottom: value.margins?.bottom ?? DEFAULT_MARGIN,
          left: value.margins?.left ?? DEFAULT_MARGIN,
        };
  const geometry: PageGeometry = Object.freeze({
    width: value.pageWidth ?? size.width,
    height: value.pageHeight ?? size.height,
    margins: Object.freeze(margins),
  });

  const issues: ValidationIssue[] = [];
  if (geometry.width - margins.left - margins.right <= 0) {
    issues.push({
      path: "margins",
      message: "left and right margins leave no content width",
    });
  }
  if (geometry.height - margins.top - margins.bottom <= 0) {
    issues.push({
      path: "margins",
      message: "top and bottom margins leave no content height",
    });
  }
  if (issues.length > 0) {
    throw new RenderConfigError(issues);
  }

  return Object.freeze({
    geometry,
    baseFontSize: value.baseFontSize,
    lineHeightRatio: value.lineHeightRatio,
    indentStep: value.indentStep,
    tocMaxLevel: value.tocMaxLevel,
    maxNestingDepth: value.maxNestingDepth,
    tocTitle: value.tocTitle,
    tocPageNumbers: value.tocPageNumbers,
    pageBreakBeforeLevel: value.pageBreakBeforeLevel,
  });
}

export const DEFAULT_RENDER_CONFIG: RenderConfig = createRenderConfig();

export function contentArea(config: RenderConfig): ContentArea {
  const { width, height, margins } = config.geometry;
  return {
    left: margins.left,
    top: height - margins.top,
    width: width - margins.left - margins.right,
    height: height - margins.top - margins.bottom,
  };
}

/** Height of one body text line; the minimum room a heading needs below it. */
export function bodyLineHeight(config: RenderConfig): number {
  return roundPoints(config.baseFontSize * config.lineHeightRatio);
}

export function roundPoints(value: number): number {
  return Math.round(value * 100) / 100;
}
