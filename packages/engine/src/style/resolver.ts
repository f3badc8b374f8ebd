import type {
  Block,
  Document,
  ParagraphTone,
  Section,
  Style,
} from "@newsdoc/shared";
import { roundPoints, type RenderConfig } from "../config";

const HEADING_SCALE = [1.8, 1.45, 1.2, 1.1, 1.0, 0.9] as const;
const HEADING_COLORS = ["#1E3A8A", "#7C3AED", "#059669"] as const;
const MINOR_HEADING_COLOR = "#7C2D12";
const HEADING_LINE_RATIO = 1.2;

const BODY_COLOR = "#374151";
const QUOTE_COLOR = "#4F46E5";
const CODE_COLOR = "#1F2937";
const RULE_COLOR = "#D1D5DB";
const RULE_THICKNESS = 1;

const TONE_COLORS: Readonly<Record<ParagraphTone, string>> = {
  general: BODY_COLOR,
  "executive-summary": "#1E40AF",
  background: "#1E40AF",
  objective: "#166534",
  methodology: "#7C2D12",
  "research-areas": "#7C2D12",
  timeline: "#059669",
  investment: "#DC2626",
  deliverable: "#9D174D",
};

/**
 * Maps a block to its style. Depends only on the block's kind, heading level,
 * nesting depth and tone plus the configuration, so resolving twice yields
 * equal styles.
 */
export function resolveStyle(block: Block, config: RenderConfig): Style {
  const base = config.baseFontSize;

  switch (block.kind) {
    case "heading": {
      const fontSize = halfPoints(base * HEADING_SCALE[block.level - 1]);
      return createStyle({
        fontWeight: "bold",
        fontSize,
        lineHeight: roundPoints(fontSize * HEADING_LINE_RATIO),
        color:
          block.level <= HEADING_COLORS.length
            ? HEADING_COLORS[block.level - 1]
            : MINOR_HEADING_COLOR,
        spaceBefore: fontSize,
        spaceAfter: Math.round(fontSize / 2),
      });
    }
    case "paragraph":
      return createStyle({
        fontSize: base,
        lineHeight: roundPoints(base * config.lineHeightRatio),
        color: TONE_COLORS[block.tone],
        spaceBefore: Math.round(base / 2),
        spaceAfter: Math.round(base / 2),
      });
    case "listItem":
      return createStyle({
        fontSize: base,
        lineHeight: roundPoints(base * config.lineHeightRatio),
        color: BODY_COLOR,
        indent: config.indentStep * (clampDepth(block.depth, config) + 1),
        spaceBefore: 2,
        spaceAfter: 2,
      });
    case "quote":
      return createStyle({
        fontStyle: "italic",
        fontSize: base,
        lineHeight: roundPoints(base * config.lineHeightRatio),
        color: QUOTE_COLOR,
        indent: config.indentStep * clampDepth(block.depth, config),
        spaceBefore: 6,
        spaceAfter: 6,
      });
    case "code": {
      const fontSize = Math.max(base - 2, 6);
      return createStyle({
        fontFamily: "mono",
        fontSize,
        lineHeight: roundPoints(fontSize * config.lineHeightRatio),
        color: CODE_COLOR,
        indent: config.indentStep,
        spaceBefore: 6,
        spaceAfter: 6,
      });
    }
    case "rule":
      return createStyle({
        fontSize: base,
        lineHeight: RULE_THICKNESS,
        color: RULE_COLOR,
        spaceBefore: 8,
        spaceAfter: 8,
      });
    default:
      return assertNever(block);
  }
}

/** Annotates every block of the document, TOC section included, in place. */
export function resolveStyles(
  document: Document,
  config: RenderConfig,
): Document {
  const visit = (section: Section) => {
    if (section.heading) {
      section.heading.style = resolveStyle(section.heading, config);
    }
    for (const block of section.blocks) {
      block.style = resolveStyle(block, config);
    }
    if (section.role === "content") {
      section.children.forEach(visit);
    }
  };

  document.sections.forEach(visit);
  return document;
}

type StyleOverrides = Partial<Style> &
  Pick<Style, "fontSize" | "lineHeight" | "color">;

function createStyle(overrides: StyleOverrides): Style {
  return Object.freeze({
    fontFamily: "sans",
    fontWeight: "normal",
    fontStyle: "normal",
    indent: 0,
    spaceBefore: 0,
    spaceAfter: 0,
    ...overrides,
  });
}

function clampDepth(depth: number, config: RenderConfig): number {
  return Math.min(Math.max(depth, 0), config.maxNestingDepth);
}

function halfPoints(value: number): number {
  return Math.round(value * 2) / 2;
}

export function assertNever(value: never): never {
  throw new Error(`unexpected block: ${JSON.stringify(value)}`);
}
