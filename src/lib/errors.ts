export type ReportErrorCode = "MISSING_INPUTS" | "RENDER_FAILED";

export class ReportError extends Error {
  readonly code: ReportErrorCode;
  readonly details?: string;

  constructor(code: ReportErrorCode, message: string, details?: string) {
    super(message);
    this.name = "ReportError";
    this.code = code;
    this.details = details;
  }
}

export function isReportError(error: unknown): error is ReportError {
  return error instanceof ReportError;
}

export function describeError(error: unknown, fallback = "Unknown error"): string {
  if (error instanceof Error) return error.message || fallback;
  if (typeof error === "string") return error || fallback;
  return fallback;
}
