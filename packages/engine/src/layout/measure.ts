import type {
  FontFace,
  FontFamily,
  FontStyle,
  FontWeight,
} from "@newsdoc/shared";
import { PDFDocument, type PDFFont, StandardFonts } from "pdf-lib";

/** Width of `text` in points when set in `face` at `size`. */
export interface TextMeasurer {
  measure(text: string, face: FontFace, size: number): number;
}

export type FaceKey = `${FontFamily}-${FontWeight}-${FontStyle}`;

export type FontSet = Readonly<Record<FaceKey, PDFFont>>;

const STANDARD_FACES: Readonly<Record<FaceKey, StandardFonts>> = {
  "sans-normal-normal": StandardFonts.Helvetica,
  "sans-bold-normal": StandardFonts.HelveticaBold,
  "sans-normal-italic": StandardFonts.HelveticaOblique,
  "sans-bold-italic": StandardFonts.HelveticaBoldOblique,
  "mono-normal-normal": StandardFonts.Courier,
  "mono-bold-normal": StandardFonts.CourierBold,
  "mono-normal-italic": StandardFonts.CourierOblique,
  "mono-bold-italic": StandardFonts.CourierBoldOblique,
};

const TAB_SPACES = "    ";
const REPLACEMENT = "?";

export function faceKey(face: FontFace): FaceKey {
  return `${face.family}-${face.weight}-${face.style}`;
}

export async function embedFonts(pdf: PDFDocument): Promise<FontSet> {
  const embed = (key: FaceKey) => pdf.embedFont(STANDARD_FACES[key]);
  const [
    sans,
    sansBold,
    sansItalic,
    sansBoldItalic,
    mono,
    monoBold,
    monoItalic,
    monoBoldItalic,
  ] = await Promise.all([
    embed("sans-normal-normal"),
    embed("sans-bold-normal"),
    embed("sans-normal-italic"),
    embed("sans-bold-italic"),
    embed("mono-normal-normal"),
    embed("mono-bold-normal"),
    embed("mono-normal-italic"),
    embed("mono-bold-italic"),
  ]);

  return {
    "sans-normal-normal": sans,
    "sans-bold-normal": sansBold,
    "sans-normal-italic": sansItalic,
    "sans-bold-italic": sansBoldItalic,
    "mono-normal-normal": mono,
    "mono-bold-normal": monoBold,
    "mono-normal-italic": monoItalic,
    "mono-bold-italic": monoBoldItalic,
  };
}

const characterSets = new WeakMap<PDFFont, ReadonlySet<number>>();

/**
 * Replaces every character the font cannot encode with `?` and expands tabs.
 * Measuring and drawing both go through this so widths match the drawn text.
 */
export function sanitizeForFont(text: string, font: PDFFont): string {
  let supported = characterSets.get(font);
  if (!supported) {
    supported = new Set(font.getCharacterSet());
    characterSets.set(font, supported);
  }
  const known = supported;

  return Array.from(text.replace(/\t/g, TAB_SPACES), (char) =>
    known.has(char.codePointAt(0) ?? -1) ? char : REPLACEMENT,
  ).join("");
}

export function createFontMeasurer(fonts: FontSet): TextMeasurer {
  return {
    measure(text, face, size) {
      const font = fonts[faceKey(face)];
      return font.widthOfTextAtSize(sanitizeForFont(text, font), size);
    },
  };
}

/** A measurer backed by the standard fonts of a scratch document. */
export async function createPdfMeasurer(): Promise<TextMeasurer> {
  const scratch = await PDFDocument.create();
  return createFontMeasurer(await embedFonts(scratch));
}
