import { ExternalError } from "./bases/external-error.js";
import type { CodesForBase } from "./catalog.js";

/**
 * Codes a failed package submission can carry
 */
export type SubmissionCode = Extract<CodesForBase<"ExternalError">, `SUBMISSION_${string}`>;

export interface SubmissionErrorOptions {
  code: SubmissionCode;
  message: string;
  /** Archive that was being submitted */
  path?: string | undefined;
  /** HTTP status of the response, when one was received */
  statusCode?: number | undefined;
  /** The transport error that triggered the failure */
  cause?: unknown;
}

/**
 * A package submission that did not produce a new item.
 *
 * Always retryable at the caller's discretion; the batch ingest controller
 * records these instead of throwing them.
 */
export class SubmissionError extends ExternalError<SubmissionCode> {
  readonly path?: string;
  readonly statusCode?: number;

  constructor(options: SubmissionErrorOptions) {
    const metadata: Record<string, string> = {};
    if (options.path !== undefined) metadata.path = options.path;
    if (options.statusCode !== undefined) metadata.statusCode = String(options.statusCode);

    super({
      code: options.code,
      message: options.message,
      metadata,
      cause: options.cause,
    });
    if (options.path !== undefined) {
      this.path = options.path;
    }
    if (options.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
  }
}

/**
 * Check if an error is a SubmissionError
 */
export function isSubmissionError(error: unknown): error is SubmissionError {
  return error instanceof SubmissionError;
}
