import { ArchivumError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { ArchivumErrorOptions } from "../types.js";

type TimeoutCode = CodesForBase<"TimeoutError">;

/**
 * Errors when an operation exceeds its deadline.
 */
export class TimeoutError<C extends TimeoutCode = "INTERNAL_TIMEOUT"> extends ArchivumError {
  readonly _tag = "TimeoutError" as const;
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
        ? { code: "INTERNAL_TIMEOUT" as C, message: messageOrOptions, metadata, traceId }
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
