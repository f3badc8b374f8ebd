import type { ParagraphTone } from "@newsdoc/shared";

// First matching rule wins, so broader keywords sit after narrower ones.
const TONE_RULES: ReadonlyArray<readonly [ParagraphTone, readonly string[]]> = [
  ["executive-summary", ["executive summary", "executive overview", "summary"]],
  ["background", ["background", "opportunity", "context", "overview"]],
  [
    "objective",
    [
      "objectives",
      "goals",
      "aims",
      "targets",
      "primary objective",
      "secondary objective",
    ],
  ],
  ["methodology", ["methodology", "approach", "methods", "process", "phases", "phase"]],
  ["research-areas", ["research areas", "focus areas", "key areas", "research focus"]],
  ["timeline", ["timeline", "schedule", "milestones", "deadlines"]],
  ["investment", ["investment", "budget", "cost", "funding", "financial"]],
  ["deliverable", ["deliverables", "outputs", "results", "outcomes", "deliverable"]],
];

/** Classifies paragraph text by the proposal section it most likely belongs to. */
export function detectTone(text: string): ParagraphTone {
  const lowered = text.toLowerCase();
  for (const [tone, keywords] of TONE_RULES) {
    if (keywords.some((keyword) => lowered.includes(keyword))) {
      return tone;
    }
  }
  return "general";
}
