import type {
  Block,
  FontFace,
  InlineRun,
  InlineSpanKind,
  LayoutLine,
  LineRun,
  Style,
} from "@newsdoc/shared";
import type { TextMeasurer } from "./measure";

interface Piece {
  readonly text: string;
  readonly face: FontFace;
  readonly link: string | null;
  readonly width: number;
}

type Word = Piece[];

export const EMPTY_LINE: LayoutLine = Object.freeze({ runs: [], width: 0 });

export function baseFace(style: Style): FontFace {
  return {
    family: style.fontFamily,
    weight: style.fontWeight,
    style: style.fontStyle,
  };
}

export function faceFor(style: Style, kind: InlineSpanKind): FontFace {
  const face = baseFace(style);
  switch (kind) {
    case "bold":
      return { ...face, weight: "bold" };
    case "italic":
      return { ...face, style: "italic" };
    case "code":
      return { ...face, family: "mono", style: "normal" };
    default:
      return face;
  }
}

/**
 * Greedy line breaking over whole words. Whitespace collapses to one space;
 * a word wider than `maxWidth` on its own is broken between characters.
 * Always returns at least one line.
 */
export function breakIntoLines(
  runs: InlineRun,
  style: Style,
  maxWidth: number,
  measurer: TextMeasurer,
): LayoutLine[] {
  const size = style.fontSize;
  const piece = (text: string, face: FontFace, link: string | null): Piece => ({
    text,
    face,
    link,
    width: measurer.measure(text, face, size),
  });

  const words = splitWords(runs, style, piece);
  const lines: LayoutLine[] = [];
  let current: Piece[] = [];
  let width = 0;

  const finishLine = () => {
    if (current.length > 0) {
      lines.push(toLine(current));
    }
    current = [];
    width = 0;
  };

  for (const word of words) {
    const last = current.at(-1);
    const space = last
      ? piece(" ", last.face, last.link === word[0]?.link ? last.link : null)
      : null;
    const wordWidth = sumWidths(word);
    const needed = (space?.width ?? 0) + wordWidth;

    if (current.length > 0 && width + needed <= maxWidth) {
      if (space) {
        current.push(space);
      }
      current.push(...word);
      width += needed;
      continue;
    }

    finishLine();
    if (wordWidth <= maxWidth) {
      current.push(...word);
      width = wordWidth;
      continue;
    }

    const chunks = breakWord(word, maxWidth, piece);
    const tail = chunks.pop() ?? [];
    for (const chunk of chunks) {
      lines.push(toLine(chunk));
    }
    current = tail;
    width = sumWidths(tail);
  }
  finishLine();

  return lines.length > 0 ? lines : [EMPTY_LINE];
}

/** The full line layout of a styled block at the given column width. */
export function layoutBlock(
  block: Block,
  style: Style,
  columnWidth: number,
  measurer: TextMeasurer,
): LayoutLine[] {
  const maxWidth = Math.max(columnWidth - style.indent, 0);

  switch (block.kind) {
    case "heading":
      return breakIntoLines(
        [{ kind: "plain", text: block.text }],
        style,
        maxWidth,
        measurer,
      );
    case "paragraph":
    case "listItem":
    case "quote":
      return breakIntoLines(block.runs, style, maxWidth, measurer);
    case "code": {
      const face = baseFace(style);
      const lines = block.lines.map((text): LayoutLine => {
        if (text.length === 0) {
          return EMPTY_LINE;
        }
        const width = measurer.measure(text, face, style.fontSize);
        return { runs: [{ text, face, width, link: null }], width };
      });
      return lines.length > 0 ? lines : [EMPTY_LINE];
    }
    case "rule":
      return [EMPTY_LINE];
  }
}

export function lineText(line: LayoutLine): string {
  return line.runs.map((run) => run.text).join("");
}

function splitWords(
  runs: InlineRun,
  style: Style,
  piece: (text: string, face: FontFace, link: string | null) => Piece,
): Word[] {
  const words: Word[] = [];
  let word: Word = [];

  for (const span of runs) {
    const face = faceFor(style, span.kind);
    const link = span.kind === "link" ? span.url : null;
    for (const token of span.text.split(/(\s+)/)) {
      if (token.length === 0) {
        continue;
      }
      if (/^\s+$/.test(token)) {
        if (word.length > 0) {
          words.push(word);
        }
        word = [];
        continue;
      }
      word.push(piece(token, face, link));
    }
  }
  if (word.length > 0) {
    words.push(word);
  }
  return words;
}

function breakWord(
  word: Word,
  maxWidth: number,
  piece: (text: string, face: FontFace, link: string | null) => Piece,
): Word[] {
  const chunks: Word[] = [];
  let chunk: Word = [];
  let width = 0;

  for (const part of word) {
    for (const char of Array.from(part.text)) {
      const glyph = piece(char, part.face, part.link);
      if (chunk.length > 0 && width + glyph.width > maxWidth) {
        chunks.push(chunk);
        chunk = [];
        width = 0;
      }
      chunk.push(glyph);
      width += glyph.width;
    }
  }
  if (chunk.length > 0) {
    chunks.push(chunk);
  }
  return chunks;
}

function toLine(pieces: readonly Piece[]): LayoutLine {
  const runs: LineRun[] = [];
  for (const next of pieces) {
    const last = runs.at(-1);
    if (last && sameFace(last.face, next.face) && last.link === next.link) {
      runs[runs.length - 1] = {
        ...last,
        text: last.text + next.text,
        width: last.width + next.width,
      };
    } else {
      runs.push({
        text: next.text,
        face: next.face,
        width: next.width,
        link: next.link,
      });
    }
  }
  return { runs, width: sumWidths(runs) };
}

function sameFace(a: FontFace, b: FontFace): boolean {
  return a.family === b.family && a.weight === b.weight && a.style === b.style;
}

function sumWidths(items: readonly { readonly width: number }[]): number {
  return items.reduce((total, item) => total + item.width, 0);
}
