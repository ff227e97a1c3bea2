import { ArchivumError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { ArchivumErrorOptions } from "../types.js";

type ExternalCode = CodesForBase<"ExternalError">;

/**
 * Errors caused by failures of the remote repository or the network in between.
 * HTTP 502/503/504. The `.code` field discriminates the specific error.
 */
export class ExternalError<C extends ExternalCode = "INTERNAL_UNAVAILABLE"> extends ArchivumError {
  readonly _tag = "ExternalError" as const;
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
        ? { code: "INTERNAL_UNAVAILABLE" as C, message: messageOrOptions, metadata, traceId }
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
