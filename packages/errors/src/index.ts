/**
 * @graphwire/errors
 *
 * Shared error taxonomy for the graphwire resource document converter.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition. Use `error.code === "XXX"` for fine-grained matching,
 * `error._tag` for exhaustive switches, or `instanceof BaseType` for
 * category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, GraphwireError, isError, isGraphwireError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export {
  CollectionAccessError,
  ConfigurationError,
  InternalError,
  MalformedDocumentError,
  MaterializationError,
  RelationshipFetchError,
  UnsupportedOperationError,
} from "./bases/index.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ApiErrorObject,
  CollectionAccessCodes,
  ConfigurationCodes,
  GraphwireErrorOptions,
  InternalCodes,
  MalformedDocumentCodes,
  MaterializationCodes,
  RelationshipFetchCodes,
  UnsupportedOperationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isCollectionAccessError,
  isConfigurationError,
  isExpectedError,
  isInternalError,
  isMalformedDocumentError,
  isMaterializationError,
  isRelationshipFetchError,
  isUnsupportedOperationError,
} from "./guards.js";
