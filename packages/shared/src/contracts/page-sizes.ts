// Named page sizes in PDF points, mirrored in contracts/page-sizes.json.

export const PAGE_SIZES = {
  a4: { width: 595.28, height: 841.89 },
  letter: { width: 612, height: 792 },
  legal: { width: 612, height: 1008 },
} as const;

export type PageSizeName = keyof typeof PAGE_SIZES;

export const PAGE_SIZE_NAMES = [
  "a4",
  "letter",
  "legal",
] as const satisfies readonly PageSizeName[];
