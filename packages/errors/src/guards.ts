/**
 * Type guards for the base error types + code-level discrimination.
 */

import type { GraphwireError } from "./base.js";
import { CollectionAccessError } from "./bases/collection-access-error.js";
import { ConfigurationError } from "./bases/configuration-error.js";
import { InternalError } from "./bases/internal-error.js";
import { MalformedDocumentError } from "./bases/malformed-document-error.js";
import { MaterializationError } from "./bases/materialization-error.js";
import { RelationshipFetchError } from "./bases/relationship-fetch-error.js";
import { UnsupportedOperationError } from "./bases/unsupported-operation-error.js";
import type { ErrorCode } from "./catalog.js";

/** Check if an error is a ConfigurationError (bad registration or options) */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/** Check if an error is a MalformedDocumentError (bad wire envelope) */
export function isMalformedDocumentError(error: unknown): error is MalformedDocumentError {
  return error instanceof MalformedDocumentError;
}

/** Check if an error is a RelationshipFetchError (relationship link failure) */
export function isRelationshipFetchError(error: unknown): error is RelationshipFetchError {
  return error instanceof RelationshipFetchError;
}

/** Check if an error is a MaterializationError (instance construction) */
export function isMaterializationError(error: unknown): error is MaterializationError {
  return error instanceof MaterializationError;
}

/** Check if an error is an UnsupportedOperationError (read-only collection) */
export function isUnsupportedOperationError(error: unknown): error is UnsupportedOperationError {
  return error instanceof UnsupportedOperationError;
}

/** Check if an error is a CollectionAccessError (index or iterator misuse) */
export function isCollectionAccessError(error: unknown): error is CollectionAccessError {
  return error instanceof CollectionAccessError;
}

/** Check if an error is an InternalError */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}

/**
 * Check if a GraphwireError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: GraphwireError,
  code: C,
): error is GraphwireError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (bad input rather than
 * a failing collaborator). Returns false for foreign values.
 */
export function isExpectedError(error: unknown): boolean {
  if (error !== null && typeof error === "object" && "isExpected" in error) {
    return error.isExpected === true;
  }
  return false;
}
