/**
 * Guards over the error hierarchy.
 */

import { ArchivumError } from "./base.js";
import { ExternalError } from "./bases/external-error.js";
import { TimeoutError } from "./bases/timeout-error.js";
import type { ErrorCode } from "./catalog.js";

export function isArchivumError(value: unknown): value is ArchivumError {
  return value instanceof ArchivumError;
}

/** A deadline ran out before the remote side answered */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/** The remote repository, or the network in between, failed */
export function isExternalError(error: unknown): error is ExternalError {
  return error instanceof ExternalError;
}

/**
 * Failures worth another attempt without changing the request:
 * timeouts and remote or network failures.
 */
export function isTransientError(error: unknown): error is TimeoutError | ExternalError {
  return isTimeoutError(error) || isExternalError(error);
}

/**
 * Whether `error` is in the hierarchy and carries `code`.
 * Narrows `.code` to the literal.
 */
export function hasCode<C extends ErrorCode>(
  error: unknown,
  code: C,
): error is ArchivumError & { readonly code: C } {
  return isArchivumError(error) && error.code === code;
}
