import { ArchivumError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { ArchivumErrorOptions } from "../types.js";

type NotFoundCode = CodesForBase<"NotFoundError">;

/**
 * Errors when a requested resource or field does not exist.
 * HTTP 404. The `.code` field discriminates the specific error.
 */
export class NotFoundError<C extends NotFoundCode = "RESOURCE_NOT_FOUND"> extends ArchivumError {
  readonly _tag = "NotFoundError" as const;
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
        ? { code: "RESOURCE_NOT_FOUND" as C, message: messageOrOptions, metadata, traceId }
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
