import { ERROR_CODES, type ErrorCode } from "@newsdoc/shared";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export abstract class EngineError extends Error {
  abstract readonly code: ErrorCode;
}

export class RenderConfigError extends EngineError {
  readonly code = ERROR_CODES.INVALID_RENDER_CONFIG;
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[], cause?: unknown) {
    super(`invalid render config: ${formatIssues(issues)}`, { cause });
    this.name = "RenderConfigError";
    this.issues = issues;
  }
}

export class ReportInputError extends EngineError {
  readonly code = ERROR_CODES.INVALID_REPORT_INPUT;
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[], cause?: unknown) {
    super(`invalid report input: ${formatIssues(issues)}`, { cause });
    this.name = "ReportInputError";
    this.issues = issues;
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

function formatIssues(issues: readonly ValidationIssue[]): string {
  return issues
    .map((issue) =>
      issue.path ? `${issue.path}: ${issue.message}` : issue.message,
    )
    .join("; ");
}
