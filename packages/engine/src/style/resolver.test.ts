import type { Block, HeadingLevel, ParagraphTone } from "@newsdoc/shared";
import { describe, expect, it } from "vitest";
import { createRenderConfig, DEFAULT_RENDER_CONFIG } from "../config.js";
import { parseMarkdown } from "../parser/blocks.js";
import { flattenBlocks } from "../model/document.js";
import { resolveStyle, resolveStyles } from "./resolver.js";

function heading(level: HeadingLevel): Block {
  return { kind: "heading", level, text: "H", style: null, assignment: null };
}

function paragraph(tone: ParagraphTone): Block {
  return {
    kind: "paragraph",
    runs: [{ kind: "plain", text: "p" }],
    tone,
    style: null,
    assignment: null,
  };
}

function listItem(depth: number): Block {
  return {
    kind: "listItem",
    marker: "unordered",
    ordinal: null,
    depth,
    group: 1,
    runs: [{ kind: "plain", text: "item" }],
    style: null,
    assignment: null,
  };
}

describe("resolveStyle", () => {
  it("scales heading sizes from the base font size", () => {
    const levels: HeadingLevel[] = [1, 2, 3, 4, 5, 6];
    const sizes = levels.map(
      (level) => resolveStyle(heading(level), DEFAULT_RENDER_CONFIG).fontSize,
    );
    expect(sizes).toEqual([20, 16, 13, 12, 11, 10]);
  });

  it("gives the first three heading levels distinct colours and shares the rest", () => {
    const colors = ([1, 2, 3, 4, 5, 6] as const).map(
      (level) => resolveStyle(heading(level), DEFAULT_RENDER_CONFIG).color,
    );
    expect(new Set(colors.slice(0, 3)).size).toBe(3);
    expect(colors[3]).toBe(colors[4]);
    expect(colors[4]).toBe(colors[5]);
    expect(colors.slice(0, 3)).not.toContain(colors[3]);
  });

  it("sets heading weight, line height and spacing", () => {
    expect(resolveStyle(heading(1), DEFAULT_RENDER_CONFIG)).toEqual({
      fontFamily: "sans",
      fontWeight: "bold",
      fontStyle: "normal",
      fontSize: 20,
      lineHeight: 24,
      color: "#1E3A8A",
      indent: 0,
      spaceBefore: 20,
      spaceAfter: 10,
    });
  });

  it("colours paragraphs by tone", () => {
    expect(resolveStyle(paragraph("general"), DEFAULT_RENDER_CONFIG).color).toBe(
      "#374151",
    );
    expect(
      resolveStyle(paragraph("investment"), DEFAULT_RENDER_CONFIG).color,
    ).toBe("#DC2626");
    expect(
      resolveStyle(paragraph("general"), DEFAULT_RENDER_CONFIG).lineHeight,
    ).toBe(14.3);
  });

  it("indents list items per depth and caps at the nesting limit", () => {
    const config = createRenderConfig({ indentStep: 10, maxNestingDepth: 2 });
    expect(resolveStyle(listItem(0), config).indent).toBe(10);
    expect(resolveStyle(listItem(1), config).indent).toBe(20);
    expect(resolveStyle(listItem(2), config).indent).toBe(30);
    expect(resolveStyle(listItem(9), config).indent).toBe(30);
  });

  it("indents quotes one step less than list items", () => {
    const quote: Block = {
      kind: "quote",
      depth: 2,
      runs: [{ kind: "plain", text: "q" }],
      style: null,
      assignment: null,
    };
    const style = resolveStyle(quote, DEFAULT_RENDER_CONFIG);
    expect(style.indent).toBe(36);
    expect(style.fontStyle).toBe("italic");
  });

  it("sets code in a smaller monospace face", () => {
    const code: Block = {
      kind: "code",
      language: null,
      lines: ["x"],
      style: null,
      assignment: null,
    };
    const style = resolveStyle(code, DEFAULT_RENDER_CONFIG);
    expect(style.fontFamily).toBe("mono");
    expect(style.fontSize).toBe(9);
    expect(style.lineHeight).toBe(11.7);
  });

  it("returns frozen, equal styles on repeated calls", () => {
    const block = heading(2);
    const first = resolveStyle(block, DEFAULT_RENDER_CONFIG);
    const second = resolveStyle(block, DEFAULT_RENDER_CONFIG);
    expect(Object.isFrozen(first)).toBe(true);
    expect(second).toEqual(first);
  });
});

describe("resolveStyles", () => {
  it("styles every block of the document", () => {
    const document = resolveStyles(
      parseMarkdown("# Title\n\ntext\n\n## Sub\n\n- a\n\n> q\n\n---\n\n```\nx\n```"),
      DEFAULT_RENDER_CONFIG,
    );
    const blocks = flattenBlocks(document);
    expect(blocks).toHaveLength(7);
    expect(blocks.every((block) => block.style !== null)).toBe(true);
  });

  it("is idempotent", () => {
    const document = parseMarkdown("# A\n\nbody");
    resolveStyles(document, DEFAULT_RENDER_CONFIG);
    const first = flattenBlocks(document).map((block) => block.style);
    resolveStyles(document, DEFAULT_RENDER_CONFIG);
    expect(flattenBlocks(document).map((block) => block.style)).toEqual(first);
  });
});
