/**
 * SDK-specific error classes extending @archivum/errors
 */

import {
  ArchivumError,
  type ErrorCode,
  ExternalError,
  TimeoutError,
  ValidationError,
} from "@archivum/errors";
import type { ErrorResponse } from "./types/index.js";

/**
 * Catalog code for an HTTP error status returned by the repository
 */
export function codeForStatus(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 400:
    case 422:
      return "VALIDATION_FAILED";
    case 401:
      return "AUTH_TOKEN_INVALID";
    case 403:
      return "AUTH_FORBIDDEN";
    case 404:
      return "RESOURCE_NOT_FOUND";
    case 409:
      return "RESOURCE_CONFLICT";
    case 408:
    case 504:
      return "INTERNAL_TIMEOUT";
    case 502:
    case 503:
      return "INTERNAL_UNAVAILABLE";
    default:
      return "INTERNAL_ERROR";
  }
}

/**
 * Error for API-level failures (4xx, 5xx responses)
 */
export class RepositoryAPIError extends ArchivumError {
  readonly _tag = "RepositoryAPIError" as const;

  /**
   * HTTP status code from the API response
   */
  public readonly statusCode: number;

  /**
   * Error body from the API, when it was JSON
   */
  public readonly response?: ErrorResponse;

  constructor(
    message: string,
    statusCode: number,
    response: ErrorResponse | undefined,
    options?: ErrorOptions,
  ) {
    super(
      codeForStatus(statusCode),
      message,
      { statusCode: String(statusCode) },
      undefined,
      options,
    );
    this.statusCode = statusCode;
    if (response !== undefined) {
      this.response = response;
    }
  }
}

/**
 * Error for request timeouts
 */
export class RepositoryTimeoutError extends TimeoutError {
  /**
   * Timeout duration in milliseconds
   */
  public readonly timeout: number;

  constructor(message: string, timeout: number, options?: ErrorOptions) {
    super({
      code: "INTERNAL_TIMEOUT",
      message,
      metadata: { timeout: String(timeout) },
      cause: options?.cause,
    });
    this.timeout = timeout;
  }
}

/**
 * Error for network-level failures (connection refused, DNS, etc.)
 */
export class RepositoryNetworkError extends ExternalError {
  constructor(message: string, options?: ErrorOptions) {
    super({ code: "INTERNAL_UNAVAILABLE", message, cause: options?.cause });
  }
}

/**
 * Error for client-side validation failures: bad configuration, a
 * representation that does not match its schema, or a link the API root
 * does not advertise
 */
export class RepositoryValidationError extends ValidationError {
  /**
   * Field that failed validation
   */
  public readonly field?: string;

  constructor(message: string, field: string | undefined, options?: ErrorOptions) {
    super({
      code: "VALIDATION_FAILED",
      message,
      metadata: field !== undefined ? { field } : undefined,
      cause: options?.cause,
      issues: field !== undefined ? [{ field, message, code: "invalid_value" }] : [],
    });
    if (field !== undefined) {
      this.field = field;
    }
  }
}
