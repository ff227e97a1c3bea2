/**
 * @archivum/errors
 *
 * Shared error taxonomy for the Archivum repository client
 *
 * The error system is built on behavioural base types:
 * ValidationError, NotFoundError, ConflictError, TimeoutError and
 * ExternalError. Codes for server-reported permission and internal
 * failures live in the catalog without a base class of their own.
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { ArchivumError, type ErrorJSON } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  type GrpcStatusCode,
  type HttpStatusCode,
} from "./catalog.js";

export { getErrorMessage } from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export {
  ConflictError,
  ExternalError,
  NotFoundError,
  TimeoutError,
  ValidationError,
} from "./bases/index.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ArchivumErrorOptions,
  ConflictCodes,
  ExternalCodes,
  NotFoundCodes,
  TimeoutCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isArchivumError,
  isExternalError,
  isTimeoutError,
  isTransientError,
} from "./guards.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export {
  InvalidArgumentError,
  MetadataFieldMissingError,
  PackageConflictError,
  PackageStateError,
  ReservedMetadataFieldError,
} from "./packaging.js";

export {
  isSubmissionError,
  SubmissionError,
  type SubmissionCode,
  type SubmissionErrorOptions,
} from "./submission.js";
