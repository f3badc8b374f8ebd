import type { SyntaxNode } from "@lezer/common";
import { parser as commonMarkParser } from "@lezer/markdown";
import type { InlineRun, InlineSpan } from "@newsdoc/shared";

/** Delimiter and destination nodes that never reach the visible text. */
const HIDDEN_NODES: ReadonlySet<string> = new Set([
  "EmphasisMark",
  "CodeMark",
  "LinkMark",
  "URL",
  "LinkTitle",
  "LinkLabel",
]);

/** `**…**` pairs CommonMark's flanking rules leave literal, e.g. `**Goal:**Next`. */
const LOOSE_BOLD = /\*\*([^*].*?)\*\*/g;

const ESCAPED_PUNCTUATION = /\\([!-\/:-@\[-`{-~])/g;

/**
 * Splits one line of inline markdown into typed spans. Only bold, italic,
 * inline code and inline links are recognised; everything else, including
 * unmatched delimiters, stays literal so that the span texts concatenate to
 * the line minus the recognised markers. Paired `**` left over in plain text
 * still counts as bold.
 */
export function parseInline(text: string): InlineRun {
  if (text.length === 0) {
    return [];
  }

  const spans: InlineSpan[] = [];
  const tree = commonMarkParser.parse(text);
  collectSpans(tree.topNode, text, spans);
  return spans.flatMap(splitLooseBold);
}

export function inlineText(run: InlineRun): string {
  return run.map((span) => span.text).join("");
}

function collectSpans(
  node: SyntaxNode,
  source: string,
  spans: InlineSpan[],
): void {
  let cursor = node.from;
  for (let child = node.firstChild; child; child = child.nextSibling) {
    pushPlain(spans, source.slice(cursor, child.from));
    emitNode(child, source, spans);
    cursor = child.to;
  }
  pushPlain(spans, source.slice(cursor, node.to));
}

function emitNode(
  node: SyntaxNode,
  source: string,
  spans: InlineSpan[],
): void {
  switch (node.type.name) {
    case "StrongEmphasis":
      pushSpan(spans, { kind: "bold", text: visibleText(node, source) });
      return;
    case "Emphasis":
      pushSpan(spans, { kind: "italic", text: visibleText(node, source) });
      return;
    case "InlineCode":
      pushSpan(spans, { kind: "code", text: codeText(node, source) });
      return;
    case "Link": {
      const link = readLink(node, source);
      if (link) {
        pushSpan(spans, link);
      } else {
        pushPlain(spans, source.slice(node.from, node.to));
      }
      return;
    }
    default:
      if (node.firstChild) {
        collectSpans(node, source, spans);
      } else {
        pushPlain(spans, source.slice(node.from, node.to));
      }
  }
}

function visibleText(
  node: SyntaxNode,
  source: string,
  from = node.from,
  to = node.to,
): string {
  let text = "";
  let cursor = from;
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (child.to <= from || child.from >= to) {
      continue;
    }
    text += source.slice(cursor, child.from);
    cursor = child.to;
    if (HIDDEN_NODES.has(child.type.name)) {
      continue;
    }
    if (child.type.name === "Link") {
      text += readLink(child, source)?.text ?? source.slice(child.from, child.to);
    } else if (child.firstChild) {
      text += visibleText(child, source);
    } else {
      text += source.slice(child.from, child.to);
    }
  }
  return text + source.slice(cursor, to);
}

function codeText(node: SyntaxNode, source: string): string {
  const open = node.firstChild;
  const close = node.lastChild;
  if (!open || !close || open === close || open.type.name !== "CodeMark") {
    return source.slice(node.from, node.to);
  }
  return source.slice(open.to, close.from);
}

function readLink(
  node: SyntaxNode,
  source: string,
): Extract<InlineSpan, { kind: "link" }> | null {
  const open = node.firstChild;
  let close: SyntaxNode | null = null;
  let url: SyntaxNode | null = null;

  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (
      close === null &&
      child.type.name === "LinkMark" &&
      source.slice(child.from, child.to) === "]"
    ) {
      close = child;
    }
    if (child.type.name === "URL") {
      url = child;
    }
  }

  if (!open || !close || !url) {
    return null;
  }

  return {
    kind: "link",
    text: visibleText(node, source, open.to, close.from),
    url: destination(source.slice(url.from, url.to)),
  };
}

/** Drops the `<…>` wrapper and backslash escapes of a link destination. */
function destination(raw: string): string {
  const unwrapped =
    raw.startsWith("<") && raw.endsWith(">") ? raw.slice(1, -1) : raw;
  return unwrapped.replace(ESCAPED_PUNCTUATION, "$1");
}

function splitLooseBold(span: InlineSpan): InlineSpan[] {
  if (span.kind !== "plain" || !span.text.includes("**")) {
    return [span];
  }

  const parts: InlineSpan[] = [];
  let cursor = 0;
  for (const match of span.text.matchAll(LOOSE_BOLD)) {
    const start = match.index ?? 0;
    if (start > cursor) {
      parts.push({ kind: "plain", text: span.text.slice(cursor, start) });
    }
    parts.push({ kind: "bold", text: match[1] });
    cursor = start + match[0].length;
  }
  if (cursor < span.text.length) {
    parts.push({ kind: "plain", text: span.text.slice(cursor) });
  }
  return parts;
}

function pushSpan(spans: InlineSpan[], span: InlineSpan): void {
  if (span.kind === "plain") {
    pushPlain(spans, span.text);
    return;
  }
  spans.push(span);
}

function pushPlain(spans: InlineSpan[], text: string): void {
  if (text.length === 0) {
    return;
  }

  const last = spans.at(-1);
  if (last?.kind === "plain") {
    spans[spans.length - 1] = { kind: "plain", text: last.text + text };
    return;
  }
  spans.push({ kind: "plain", text });
}
