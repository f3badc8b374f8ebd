import type {
  CodeBlock,
  Document,
  HeadingBlock,
  HeadingLevel,
  ListMarker,
} from "@newsdoc/shared";
import { silentLogger, type LoggerMethods } from "../logger";
import { DocumentBuilder } from "../model/document";
import { inlineText, parseInline } from "./inline";
import {
  closesFence,
  type FenceLine,
  fenceFromLine,
  headingFromLine,
  isRuleLine,
  listDepth,
  listFromLine,
  quoteFromLine,
} from "./shared";
import { detectTone } from "./tone";

export interface ParseOptions {
  readonly logger?: LoggerMethods;
}

const HEADING_LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];

interface OpenFence {
  readonly fence: FenceLine;
  readonly lines: string[];
}

interface OpenQuote {
  readonly depth: number;
  readonly lines: string[];
}

interface ListContinuity {
  readonly marker: ListMarker;
  readonly group: number;
}

/**
 * Parses loosely structured markdown into a document. Never throws: syntax it
 * does not recognise ends up as paragraph text.
 */
export function parseMarkdown(
  raw: string,
  options: ParseOptions = {},
): Document {
  const logger = options.logger ?? silentLogger;
  const builder = new DocumentBuilder();
  const lines = normalizeSource(raw).split("\n");

  let paragraph: string[] = [];
  let quote: OpenQuote | null = null;
  let fence: OpenFence | null = null;
  let list: ListContinuity | null = null;
  let groupCount = 0;

  const flushParagraph = () => {
    if (paragraph.length === 0) {
      return;
    }
    const text = paragraph.join(" ");
    builder.append({
      kind: "paragraph",
      runs: parseInline(text),
      tone: detectTone(text),
      style: null,
      assignment: null,
    });
    paragraph = [];
  };

  const flushQuote = () => {
    if (!quote) {
      return;
    }
    builder.append({
      kind: "quote",
      depth: quote.depth,
      runs: parseInline(quote.lines.join(" ")),
      style: null,
      assignment: null,
    });
    quote = null;
  };

  const flushText = () => {
    flushParagraph();
    flushQuote();
  };

  for (const line of lines) {
    if (fence) {
      if (closesFence(line, fence.fence)) {
        builder.append(codeBlock(fence));
        fence = null;
      } else {
        fence.lines.push(line);
      }
      continue;
    }

    if (line.trim().length === 0) {
      flushText();
      list = null;
      continue;
    }

    const opening = fenceFromLine(line);
    if (opening) {
      flushText();
      list = null;
      fence = { fence: opening, lines: [] };
      continue;
    }

    const heading = headingFromLine(line);
    if (heading) {
      flushText();
      list = null;
      builder.openSection(headingBlock(heading.level, heading.text));
      continue;
    }

    const quoted = quoteFromLine(line);
    if (quoted) {
      flushParagraph();
      list = null;
      if (quote && quote.depth !== quoted.depth) {
        flushQuote();
      }
      if (quoted.text.length === 0) {
        flushQuote();
        continue;
      }
      if (quote) {
        quote.lines.push(quoted.text);
      } else {
        quote = { depth: quoted.depth, lines: [quoted.text] };
      }
      continue;
    }

    if (isRuleLine(line)) {
      flushText();
      list = null;
      builder.append({ kind: "rule", style: null, assignment: null });
      continue;
    }

    const item = listFromLine(line);
    if (item) {
      flushText();
      const marker: ListMarker = item.ordinal === null ? "unordered" : "ordered";
      if (!list || list.marker !== marker) {
        groupCount += 1;
        list = { marker, group: groupCount };
      }
      builder.append({
        kind: "listItem",
        marker,
        ordinal: item.ordinal,
        depth: listDepth(item.indent),
        group: list.group,
        runs: parseInline(item.text),
        style: null,
        assignment: null,
      });
      continue;
    }

    flushQuote();
    list = null;
    paragraph.push(line.trim());
  }

  flushText();
  if (fence) {
    logger.debug(
      `[BlockParser] closing unterminated ${fence.fence.marker} fence at end of input`,
    );
    builder.append(codeBlock(fence));
  }

  return builder.build();
}

/**
 * Unifies line endings. Producers that escape their newlines hand over one
 * physical line with literal `\n` sequences; those are unescaped.
 */
export function normalizeSource(raw: string): string {
  const unified = raw.replace(/\r\n?/g, "\n");
  if (unified.includes("\n") || !unified.includes("\\n")) {
    return unified;
  }
  return unified.replace(/\\n/g, "\n").replace(/\\t/g, "\t");
}

function headingBlock(level: number, rawText: string): HeadingBlock {
  return {
    kind: "heading",
    level: HEADING_LEVELS.find((candidate) => candidate === level) ?? 6,
    text: inlineText(parseInline(rawText)),
    style: null,
    assignment: null,
  };
}

function codeBlock(open: OpenFence): CodeBlock {
  return {
    kind: "code",
    language: open.fence.language,
    lines: open.lines,
    style: null,
    assignment: null,
  };
}
