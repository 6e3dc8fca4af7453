/**
 * Type infrastructure for the error system.
 *
 * Provides construction options and the structured detail records carried by
 * document and relationship errors.
 */

import type { BaseErrorType, CodesForBase, ErrorCode } from "./catalog.js";

// ============================================================================
// STRUCTURED DETAIL
// ============================================================================

/**
 * Structured validation issue (path-level detail from schema validation)
 */
export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * One entry of a wire document's `errors` array.
 */
export interface ApiErrorObject {
  readonly id?: string | undefined;
  readonly status?: string | undefined;
  readonly code?: string | undefined;
  readonly title?: string | undefined;
  readonly detail?: string | undefined;
  readonly source?: Readonly<Record<string, unknown>> | undefined;
  readonly meta?: Readonly<Record<string, unknown>> | undefined;
}

// ============================================================================
// ERROR CONSTRUCTION OPTIONS
// ============================================================================

/**
 * Options for constructing a base error type.
 * The code determines domain and isExpected via catalog lookup.
 */
export interface GraphwireErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  metadata?: Record<string, string> | undefined;
  cause?: unknown;
}

export type { BaseErrorType, CodesForBase };

/**
 * Union of error codes for each base type (convenience aliases)
 */
export type ConfigurationCodes = CodesForBase<"ConfigurationError">;
export type MalformedDocumentCodes = CodesForBase<"MalformedDocumentError">;
export type RelationshipFetchCodes = CodesForBase<"RelationshipFetchError">;
export type MaterializationCodes = CodesForBase<"MaterializationError">;
export type UnsupportedOperationCodes = CodesForBase<"UnsupportedOperationError">;
export type CollectionAccessCodes = CodesForBase<"CollectionAccessError">;
export type InternalCodes = CodesForBase<"InternalError">;
