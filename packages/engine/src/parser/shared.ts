const HEADING_PATTERN = /^ {0,3}(#{1,6})\s+(.*?)(?:\s+#+)?\s*$/;
const QUOTE_PATTERN = /^ {0,3}((?:> ?)+)(.*)$/;
const LIST_PATTERN = /^([ \t]*)([-*+]|\d{1,9}\.)\s+(.*)$/;
const FENCE_PATTERN = /^ {0,3}(`{3,}|~{3,})[ \t]*([^`\s]*)[^`]*$/;
const RULE_PATTERN = /^ {0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/;

export const LIST_TAB_STOP = 4;

export interface HeadingLine {
  readonly level: number;
  readonly text: string;
}

export interface QuoteLine {
  readonly depth: number;
  readonly text: string;
}

export interface ListLine {
  readonly indent: number;
  readonly ordinal: number | null;
  readonly text: string;
}

export interface FenceLine {
  readonly marker: string;
  readonly language: string | null;
}

export function headingFromLine(line: string): HeadingLine | null {
  const match = HEADING_PATTERN.exec(line);
  if (!match) {
    return null;
  }

  return { level: match[1].length, text: match[2].trim() };
}

export function quoteFromLine(line: string): QuoteLine | null {
  const match = QUOTE_PATTERN.exec(line);
  if (!match) {
    return null;
  }

  const depth = match[1].split(">").length - 1;
  return { depth, text: match[2].trim() };
}

export function listFromLine(line: string): ListLine | null {
  const match = LIST_PATTERN.exec(line);
  if (!match) {
    return null;
  }

  const marker = match[2];
  return {
    indent: indentWidth(match[1]),
    ordinal: marker.endsWith(".")
      ? Number.parseInt(marker.slice(0, -1), 10)
      : null,
    text: match[3].trim(),
  };
}

export function fenceFromLine(line: string): FenceLine | null {
  const match = FENCE_PATTERN.exec(line);
  if (!match) {
    return null;
  }

  return { marker: match[1], language: match[2] ? match[2] : null };
}

export function closesFence(line: string, opening: FenceLine): boolean {
  const trimmed = line.trim();
  return (
    trimmed.length >= opening.marker.length &&
    trimmed === opening.marker[0].repeat(trimmed.length)
  );
}

export function isRuleLine(line: string): boolean {
  return RULE_PATTERN.test(line);
}

export function listDepth(indent: number): number {
  return Math.round(indent / LIST_TAB_STOP);
}

function indentWidth(whitespace: string): number {
  let width = 0;
  for (const char of whitespace) {
    width =
      char === "\t" ? width + LIST_TAB_STOP - (width % LIST_TAB_STOP) : width + 1;
  }
  return width;
}
