// Engine error codes, mirrored in contracts/error-codes.json.

export const ERROR_CODES = {
  INVALID_RENDER_CONFIG: "INVALID_RENDER_CONFIG",
  INVALID_REPORT_INPUT: "INVALID_REPORT_INPUT",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
