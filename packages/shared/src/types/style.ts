export type FontFamily = "sans" | "mono";
export type FontWeight = "normal" | "bold";
export type FontStyle = "normal" | "italic";

export interface FontFace {
  readonly family: FontFamily;
  readonly weight: FontWeight;
  readonly style: FontStyle;
}

/**
 * Resolved visual style of one block. Sizes and distances are in PDF points;
 * `color` is a `#RRGGBB` hex string.
 */
export interface Style {
  readonly fontFamily: FontFamily;
  readonly fontWeight: FontWeight;
  readonly fontStyle: FontStyle;
  readonly fontSize: number;
  readonly lineHeight: number;
  readonly color: string;
  readonly indent: number;
  readonly spaceBefore: number;
  readonly spaceAfter: number;
}
