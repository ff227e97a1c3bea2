/**
 * Error Catalog - Single Source of Truth
 *
 * This catalog defines all error codes used across the Archivum packages.
 * Each error code maps to an HTTP status code, a gRPC canonical code, and a
 * base error type of the behavioural hierarchy.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, AUTH, RESOURCE, VALIDATION, PACKAGE, METADATA, SUBMISSION
 */

/**
 * The behavioural base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "PermissionError"
  | "ConflictError"
  | "TimeoutError"
  | "ExternalError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    httpStatus: 500,
    grpcCode: "INTERNAL" as const,
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },
  INTERNAL_UNAVAILABLE: {
    domain: "internal",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Service unavailable",
    description: "The repository service could not be reached",
  },
  INTERNAL_TIMEOUT: {
    domain: "internal",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED" as const,
    baseType: "TimeoutError" as const,
    isExpected: false,
    title: "Request timeout",
    description: "The operation exceeded the deadline",
  },

  // ============================================================================
  // AUTH ERRORS - Authentication and authorization
  // ============================================================================
  AUTH_TOKEN_INVALID: {
    domain: "auth",
    httpStatus: 401,
    grpcCode: "UNAUTHENTICATED" as const,
    baseType: "PermissionError" as const,
    isExpected: true,
    title: "Invalid authentication token",
    description: "The API token is missing, invalid or expired",
  },
  AUTH_FORBIDDEN: {
    domain: "auth",
    httpStatus: 403,
    grpcCode: "PERMISSION_DENIED" as const,
    baseType: "PermissionError" as const,
    isExpected: true,
    title: "Access forbidden",
    description: "The token does not grant access to this resource",
  },

  // ============================================================================
  // RESOURCE ERRORS - Remote resource operations
  // ============================================================================
  RESOURCE_NOT_FOUND: {
    domain: "resource",
    httpStatus: 404,
    grpcCode: "NOT_FOUND" as const,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Resource not found",
    description: "The requested resource does not exist",
  },
  RESOURCE_CONFLICT: {
    domain: "resource",
    httpStatus: 409,
    grpcCode: "ABORTED" as const,
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Resource conflict",
    description: "The request conflicts with the current state of the resource",
  },
  RESOURCE_READ_ONLY: {
    domain: "resource",
    httpStatus: 400,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Read-only field",
    description: "The field is computed by the repository and cannot be written",
  },

  // ============================================================================
  // VALIDATION ERRORS - Bad input and configuration
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Validation failed",
    description: "The input failed validation",
  },
  VALIDATION_INVALID_ARGUMENT: {
    domain: "validation",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Invalid argument",
    description: "An argument is outside the set of allowed values",
  },

  // ============================================================================
  // PACKAGE ERRORS - Client-side package construction
  // ============================================================================
  PACKAGE_INVALID_STATE: {
    domain: "package",
    httpStatus: 409,
    grpcCode: "FAILED_PRECONDITION" as const,
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Invalid packaging state",
    description: "The packager is not open, or the operation was already performed",
  },
  PACKAGE_ENTRY_CONFLICT: {
    domain: "package",
    httpStatus: 409,
    grpcCode: "ALREADY_EXISTS" as const,
    baseType: "ConflictError" as const,
    isExpected: true,
    title: "Duplicate package entry",
    description: "Another attachment already uses this destination name",
  },
  METADATA_FIELD_MISSING: {
    domain: "metadata",
    httpStatus: 404,
    grpcCode: "NOT_FOUND" as const,
    baseType: "NotFoundError" as const,
    isExpected: true,
    title: "Metadata field missing",
    description: "The single-valued metadata field has not been set",
  },
  METADATA_FIELD_RESERVED: {
    domain: "metadata",
    httpStatus: 400,
    grpcCode: "INVALID_ARGUMENT" as const,
    baseType: "ValidationError" as const,
    isExpected: true,
    title: "Reserved metadata field",
    description: "The field name is taken by an item property of the manifest",
  },

  // ============================================================================
  // SUBMISSION ERRORS - Package submission to a collection
  // ============================================================================
  SUBMISSION_REJECTED: {
    domain: "submission",
    httpStatus: 502,
    grpcCode: "UNKNOWN" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Package rejected",
    description: "The repository answered the submission with an unexpected status",
  },
  SUBMISSION_CONNECTION_FAILED: {
    domain: "submission",
    httpStatus: 503,
    grpcCode: "UNAVAILABLE" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Connection failed",
    description: "The package could not be delivered to the repository",
  },
  SUBMISSION_TIMEOUT: {
    domain: "submission",
    httpStatus: 504,
    grpcCode: "DEADLINE_EXCEEDED" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Submission timed out",
    description: "The repository did not answer the submission in time",
  },
  SUBMISSION_INVALID_RESPONSE: {
    domain: "submission",
    httpStatus: 502,
    grpcCode: "UNKNOWN" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Invalid submission response",
    description: "The repository accepted the package without a Location header",
  },
  SUBMISSION_FAILED: {
    domain: "submission",
    httpStatus: 500,
    grpcCode: "UNKNOWN" as const,
    baseType: "ExternalError" as const,
    isExpected: false,
    title: "Submission failed",
    description: "The package submission raised an unexpected error",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * gRPC canonical status codes used in the catalog
 */
export type GrpcStatusCode = ErrorCatalogEntry["grpcCode"];

/**
 * HTTP status codes used in the catalog
 */
export type HttpStatusCode = ErrorCatalogEntry["httpStatus"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
