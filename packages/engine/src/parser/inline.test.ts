import { describe, expect, it } from "vitest";
import { inlineText, parseInline } from "./inline.js";

describe("inline parsing", () => {
  it("splits plain text around bold", () => {
    expect(parseInline("Some **bold** text.")).toEqual([
      { kind: "plain", text: "Some " },
      { kind: "bold", text: "bold" },
      { kind: "plain", text: " text." },
    ]);
  });

  it("recognises both italic delimiters and double-underscore bold", () => {
    expect(parseInline("*it* and _also_")).toEqual([
      { kind: "italic", text: "it" },
      { kind: "plain", text: " and " },
      { kind: "italic", text: "also" },
    ]);
    expect(parseInline("__strong__")).toEqual([
      { kind: "bold", text: "strong" },
    ]);
  });

  it("bolds paired asterisks that touch the following word", () => {
    expect(parseInline("**Primary Objective:**Understand users")).toEqual([
      { kind: "bold", text: "Primary Objective:" },
      { kind: "plain", text: "Understand users" },
    ]);
    expect(inlineText(parseInline("a **b:**c and **d:**e"))).toBe(
      "a b:c and d:e",
    );
  });

  it("keeps inline code content verbatim", () => {
    expect(parseInline("run `npm **test**` now")).toEqual([
      { kind: "plain", text: "run " },
      { kind: "code", text: "npm **test**" },
      { kind: "plain", text: " now" },
    ]);
  });

  it("reduces links to their visible text and keeps the url", () => {
    expect(parseInline("see [the docs](https://example.com/docs) today")).toEqual([
      { kind: "plain", text: "see " },
      { kind: "link", text: "the docs", url: "https://example.com/docs" },
      { kind: "plain", text: " today" },
    ]);
    expect(parseInline("[**Bold** link](https://example.com)")).toEqual([
      { kind: "link", text: "Bold link", url: "https://example.com" },
    ]);
  });

  it("unwraps angle-bracket destinations and their escapes", () => {
    expect(parseInline("[a](<http://x.com/a(b>)")).toEqual([
      { kind: "link", text: "a", url: "http://x.com/a(b" },
    ]);
    expect(parseInline("[b](https://example.com/a\\)c)")).toEqual([
      { kind: "link", text: "b", url: "https://example.com/a)c" },
    ]);
  });

  it("flattens nested emphasis into the outer span", () => {
    expect(parseInline("**bold with *nested* italic**")).toEqual([
      { kind: "bold", text: "bold with nested italic" },
    ]);
  });

  it.each([
    "**unterminated",
    "`open code",
    "[label](https://example.com",
    "a * b * c",
    "snake_case_name",
    "not \\*bold\\*",
  ])("keeps malformed markup %j as literal text", (input) => {
    expect(parseInline(input)).toEqual([{ kind: "plain", text: input }]);
  });

  it.each([
    ["a **b** c", "a b c"],
    ["x [y](https://example.com) z", "x y z"],
    ["_x_ and `y`", "x and y"],
    ["**a", "**a"],
    ["tail *", "tail *"],
  ])("reconstructs %j without markers", (input, visible) => {
    expect(inlineText(parseInline(input))).toBe(visible);
  });

  it("returns no spans for empty text", () => {
    expect(parseInline("")).toEqual([]);
  });
});
