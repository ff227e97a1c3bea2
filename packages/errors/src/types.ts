/**
 * Type infrastructure for the error system.
 *
 * Provides generic constraints and construction options for the
 * behavioural base types.
 */

import type { BaseErrorType, CodesForBase, ErrorCode } from "./catalog.js";

// ============================================================================
// VALIDATION ISSUE
// ============================================================================

/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
  value?: unknown;
}

// ============================================================================
// ERROR CONSTRUCTION OPTIONS
// ============================================================================

/**
 * Options for constructing a base error type.
 * The code determines httpStatus, grpcCode, domain, and isExpected via catalog lookup.
 */
export interface ArchivumErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  metadata?: Record<string, string> | undefined;
  traceId?: string | undefined;
  cause?: unknown;
}

// ============================================================================
// BASE ERROR UNION
// ============================================================================

export type { BaseErrorType, CodesForBase };

/**
 * Union of error codes for each base type (convenience aliases)
 */
export type ValidationCodes = CodesForBase<"ValidationError">;
export type NotFoundCodes = CodesForBase<"NotFoundError">;
export type ConflictCodes = CodesForBase<"ConflictError">;
export type TimeoutCodes = CodesForBase<"TimeoutError">;
export type ExternalCodes = CodesForBase<"ExternalError">;
