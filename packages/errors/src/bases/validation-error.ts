import { ArchivumError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { ArchivumErrorOptions, ValidationIssue } from "../types.js";

type ValidationCode = CodesForBase<"ValidationError">;

type ValidationErrorOptions<C extends ValidationCode> = ArchivumErrorOptions<C> & {
  issues?: readonly ValidationIssue[];
};

/**
 * Errors caused by invalid input, configuration, or request data.
 * HTTP 400-class. The `.code` field discriminates the specific error.
 */
export class ValidationError<
  C extends ValidationCode = "VALIDATION_FAILED",
> extends ArchivumError {
  readonly _tag = "ValidationError" as const;
  declare readonly code: C;

  /** Structured validation issues (populated for VALIDATION_FAILED) */
  readonly issues: readonly ValidationIssue[];

  constructor(options: ValidationErrorOptions<C>);
  constructor(
    message: string,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  );
  constructor(
    messageOrOptions: string | ValidationErrorOptions<C>,
    issues?: readonly ValidationIssue[],
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: ValidationErrorOptions<C> =
      typeof messageOrOptions === "string"
        ? { code: "VALIDATION_FAILED" as C, message: messageOrOptions, metadata, traceId, issues }
        : messageOrOptions;
    super(
      opts.code,
      opts.message,
      opts.metadata,
      opts.traceId,
      opts.cause !== undefined ? { cause: opts.cause } : undefined,
    );
    this.issues = opts.issues ?? [];
  }
}
