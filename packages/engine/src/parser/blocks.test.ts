import type { ContentSection, Section } from "@newsdoc/shared";
import { describe, expect, it } from "vitest";
import { flattenBlocks } from "../model/document.js";
import { normalizeSource, parseMarkdown } from "./blocks.js";

function content(section: Section | undefined): ContentSection {
  if (!section || section.role !== "content") {
    throw new Error("expected a content section");
  }
  return section;
}

describe("block parser", () => {
  it("builds the section tree for a small report", () => {
    const document = parseMarkdown(
      "# Title\n\nSome **bold** text.\n\n## Sub\n- item one\n- item two",
    );

    expect(document.sections).toHaveLength(1);
    const title = content(document.sections[0]);
    expect(title.level).toBe(1);
    expect(title.heading?.text).toBe("Title");
    expect(title.blocks).toEqual([
      {
        kind: "paragraph",
        runs: [
          { kind: "plain", text: "Some " },
          { kind: "bold", text: "bold" },
          { kind: "plain", text: " text." },
        ],
        tone: "general",
        style: null,
        assignment: null,
      },
    ]);

    expect(title.children).toHaveLength(1);
    const sub = title.children[0];
    expect(sub.level).toBe(2);
    expect(sub.heading?.text).toBe("Sub");
    expect(sub.blocks.map((block) => block.kind)).toEqual([
      "listItem",
      "listItem",
    ]);
    expect(sub.blocks[1]).toMatchObject({
      marker: "unordered",
      ordinal: null,
      depth: 0,
      group: 1,
      runs: [{ kind: "plain", text: "item two" }],
    });
    expect(document.pages).toBeNull();
    expect(document.toc).toBeNull();
  });

  it("closes an unterminated fence at end of input", () => {
    const document = parseMarkdown("intro\n```ts\nconst a = 1;\n\n  indented\n");
    const blocks = flattenBlocks(document);

    expect(blocks.map((block) => block.kind)).toEqual(["paragraph", "code"]);
    expect(blocks[1]).toMatchObject({
      kind: "code",
      language: "ts",
      lines: ["const a = 1;", "", "  indented", ""],
    });
  });

  it("keeps fenced lines verbatim, including markdown syntax", () => {
    const document = parseMarkdown("~~~\n# not a heading\n- not a list\n~~~\nafter");
    const blocks = flattenBlocks(document);

    expect(blocks[0]).toMatchObject({
      kind: "code",
      language: null,
      lines: ["# not a heading", "- not a list"],
    });
    expect(blocks[1]).toMatchObject({ kind: "paragraph" });
  });

  it("merges quote lines of equal depth", () => {
    const blocks = flattenBlocks(
      parseMarkdown("> first\n> second\n>> deeper\n\n> again"),
    );

    expect(blocks).toEqual([
      expect.objectContaining({
        kind: "quote",
        depth: 1,
        runs: [{ kind: "plain", text: "first second" }],
      }),
      expect.objectContaining({
        kind: "quote",
        depth: 2,
        runs: [{ kind: "plain", text: "deeper" }],
      }),
      expect.objectContaining({
        kind: "quote",
        depth: 1,
        runs: [{ kind: "plain", text: "again" }],
      }),
    ]);
  });

  it("derives list depth from indentation and groups marker families", () => {
    const blocks = flattenBlocks(
      parseMarkdown("- a\n    - b\n        - c\n1. one\n2. two\n\t- tab"),
    );

    expect(
      blocks.map((block) =>
        block.kind === "listItem"
          ? [block.marker, block.ordinal, block.depth, block.group]
          : null,
      ),
    ).toEqual([
      ["unordered", null, 0, 1],
      ["unordered", null, 1, 1],
      ["unordered", null, 2, 1],
      ["ordered", 1, 0, 2],
      ["ordered", 2, 0, 2],
      ["unordered", null, 1, 3],
    ]);
  });

  it("recognises horizontal rules before list items", () => {
    const blocks = flattenBlocks(parseMarkdown("---\n* * *\n___\n- - -"));
    expect(blocks.map((block) => block.kind)).toEqual([
      "rule",
      "rule",
      "rule",
      "rule",
    ]);
  });

  it("fills skipped heading levels with untitled sections", () => {
    const document = parseMarkdown("### Deep\ntext");
    const root = content(document.sections[0]);

    expect(root.level).toBe(1);
    expect(root.heading).toBeNull();
    expect(root.children[0].level).toBe(2);
    expect(root.children[0].heading).toBeNull();
    expect(root.children[0].children[0].level).toBe(3);
    expect(root.children[0].children[0].heading?.text).toBe("Deep");
  });

  it("closes open sections when a heading of equal or lower level arrives", () => {
    const document = parseMarkdown("# A\n## B\n### C\n## D\n# E");
    const first = content(document.sections[0]);

    expect(document.sections.map((section) => section.heading?.text)).toEqual([
      "A",
      "E",
    ]);
    expect(first.children.map((section) => section.heading?.text)).toEqual([
      "B",
      "D",
    ]);
    expect(first.children[0].children[0].heading?.text).toBe("C");
  });

  it("puts content before the first heading into an untitled section", () => {
    const document = parseMarkdown("intro\n# A");
    expect(document.sections).toHaveLength(2);
    expect(document.sections[0].heading).toBeNull();
    expect(document.sections[0].blocks).toHaveLength(1);
    expect(document.sections[1].heading?.text).toBe("A");
  });

  it("joins consecutive plain lines into one paragraph", () => {
    const blocks = flattenBlocks(parseMarkdown("line one\n  line two\n\nnext"));
    expect(blocks).toEqual([
      expect.objectContaining({
        runs: [{ kind: "plain", text: "line one line two" }],
      }),
      expect.objectContaining({ runs: [{ kind: "plain", text: "next" }] }),
    ]);
  });

  it("degrades malformed headings to paragraphs", () => {
    const blocks = flattenBlocks(parseMarkdown("#NoSpace\n\n####### seven"));
    expect(blocks).toEqual([
      expect.objectContaining({
        kind: "paragraph",
        runs: [{ kind: "plain", text: "#NoSpace" }],
      }),
      expect.objectContaining({
        kind: "paragraph",
        runs: [{ kind: "plain", text: "####### seven" }],
      }),
    ]);
  });

  it("strips inline markers and closing hashes from heading text", () => {
    const blocks = flattenBlocks(parseMarkdown("## **Executive Summary** ##"));
    expect(blocks[0]).toMatchObject({
      kind: "heading",
      level: 2,
      text: "Executive Summary",
    });
  });

  it("tags paragraphs with a tone from their wording", () => {
    const blocks = flattenBlocks(
      parseMarkdown("Our methodology relies on interviews.\n\nPlain words."),
    );
    expect(blocks.map((block) => (block.kind === "paragraph" ? block.tone : null))).toEqual([
      "methodology",
      "general",
    ]);
  });

  it.each([
    ["Primary Objective: understand the onboarding flow.", "objective"],
    ["Results will be shared with partners.", "deliverable"],
    ["Each of the phases ends with a review.", "methodology"],
  ])("tags %j as %s", (text, tone) => {
    expect(flattenBlocks(parseMarkdown(text))[0]).toMatchObject({
      kind: "paragraph",
      tone,
    });
  });

  it.each(["", "\n\n", "```", ">", "-", "[", "**", "> \n>>"])(
    "never throws on %j",
    (input) => {
      expect(() => parseMarkdown(input)).not.toThrow();
    },
  );

  it("turns a lone fence into an empty code block", () => {
    expect(flattenBlocks(parseMarkdown("```"))).toEqual([
      expect.objectContaining({ kind: "code", lines: [] }),
    ]);
  });
});

describe("source normalisation", () => {
  it("unescapes literal newlines from single-line producers", () => {
    expect(normalizeSource("# Title\\n\\nBody\\ttext")).toBe(
      "# Title\n\nBody\ttext",
    );
  });

  it("leaves escapes alone when the text already has line breaks", () => {
    expect(normalizeSource("printf(\"\\n\");\r\nnext")).toBe(
      "printf(\"\\n\");\nnext",
    );
  });
});
