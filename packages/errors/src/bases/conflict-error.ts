import { ArchivumError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { ArchivumErrorOptions } from "../types.js";

type ConflictCode = CodesForBase<"ConflictError">;

/**
 * Errors when an operation conflicts with the current resource or packaging state.
 * HTTP 409. The `.code` field discriminates the specific error.
 */
export class ConflictError<C extends ConflictCode = "RESOURCE_CONFLICT"> extends ArchivumError {
  readonly _tag = "ConflictError" as const;
  declare readonly code: C;

  constructor(options: ArchivumErrorOptions<C>);
  constructor(message: string, metadata?: Record<string, string>, traceId?: string);
  constructor(
    messageOrOptions: string | ArchivumErrorOptions<C>,
    metadata?: Record<string, string>,
    traceId?: string,
  ) {
    const opts: ArchivumErrorOptions<C> =
      typeof messageOrOptions === "string"
        ? { code: "RESOURCE_CONFLICT" as C, message: messageOrOptions, metadata, traceId }
        : messageOrOptions;
    super(
      opts.code,
      opts.message,
      opts.metadata,
      opts.traceId,
      opts.cause !== undefined ? { cause: opts.cause } : undefined,
    );
  }
}
