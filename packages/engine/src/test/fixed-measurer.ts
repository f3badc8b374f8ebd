import type { TextMeasurer } from "../layout/measure";

/**
 * Every character advances `ratio` times the font size, whatever the face.
 * Keeps layout expectations in tests independent of font metrics.
 */
export function createFixedMeasurer(ratio = 0.5): TextMeasurer {
  return {
    measure: (text, _face, size) => Array.from(text).length * size * ratio,
  };
}
