import {
  ERROR_CATALOG,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

/**
 * Wire shape produced by `ArchivumError.toJSON()`
 */
export interface ErrorJSON {
  _tag: string;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  httpStatus: HttpStatusCode;
  grpcCode: GrpcStatusCode;
  isExpected: boolean;
  metadata?: Record<string, string>;
  traceId?: string;
  timestamp: string;
}

/**
 * Root of the Archivum error hierarchy.
 *
 * The catalog entry for `code` fills in the HTTP status, gRPC code, domain
 * and the expected/unexpected flag, so subclasses only pick a code.
 */
export abstract class ArchivumError extends Error {
  abstract readonly _tag: string;
  readonly code: ErrorCode;
  readonly httpStatus: HttpStatusCode;
  readonly grpcCode: GrpcStatusCode;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly metadata?: Record<string, string>;
  readonly traceId?: string;
  readonly timestamp: Date;

  constructor(
    code: ErrorCode,
    message: string,
    metadata?: Record<string, string>,
    traceId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    const entry = ERROR_CATALOG[code];
    this.code = code;
    this.httpStatus = entry.httpStatus;
    this.grpcCode = entry.grpcCode;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    if (metadata !== undefined) {
      this.metadata = metadata;
    }
    if (traceId !== undefined) {
      this.traceId = traceId;
    }
    this.timestamp = new Date();
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      httpStatus: this.httpStatus,
      grpcCode: this.grpcCode,
      isExpected: this.isExpected,
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.traceId ? { traceId: this.traceId } : {}),
      timestamp: this.timestamp.toISOString(),
    };
  }
}
