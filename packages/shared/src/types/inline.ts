export type InlineSpan =
  | { readonly kind: "plain"; readonly text: string }
  | { readonly kind: "bold"; readonly text: string }
  | { readonly kind: "italic"; readonly text: string }
  | { readonly kind: "code"; readonly text: string }
  | { readonly kind: "link"; readonly text: string; readonly url: string };

export type InlineSpanKind = InlineSpan["kind"];

/** Spans in source order; their texts concatenate to the visible line. */
export type InlineRun = readonly InlineSpan[];
