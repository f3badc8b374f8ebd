import { type PDFPage, PDFString } from "pdf-lib";

export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

function corners(rect: Rect): number[] {
  return [rect.x, rect.y, rect.x + rect.width, rect.y + rect.height];
}

/**
 * URI actions hold 7-bit ASCII in a literal string: non-ASCII characters are
 * percent-encoded and the string delimiters escaped.
 */
function encodeUri(url: string): string {
  return url
    .replace(/[^\x20-\x7E]/gu, (char) => encodeURIComponent(char))
    .replace(/[\\()]/g, "\\$&");
}

/** Clickable area on `page` that opens `url`. */
export function addUriLink(page: PDFPage, rect: Rect, url: string): void {
  const context = page.doc.context;
  const annotation = context.obj({
    Type: "Annot",
    Subtype: "Link",
    Rect: corners(rect),
    Border: [0, 0, 0],
    A: { Type: "Action", S: "URI", URI: PDFString.of(encodeUri(url)) },
  });
  page.node.addAnnot(context.register(annotation));
}

/** Clickable area on `page` that jumps to height `top` on `target`. */
export function addPageLink(
  page: PDFPage,
  rect: Rect,
  target: PDFPage,
  top: number,
): void {
  const context = page.doc.context;
  const annotation = context.obj({
    Type: "Annot",
    Subtype: "Link",
    Rect: corners(rect),
    Border: [0, 0, 0],
    Dest: [target.ref, "XYZ", null, top, null],
  });
  page.node.addAnnot(context.register(annotation));
}
