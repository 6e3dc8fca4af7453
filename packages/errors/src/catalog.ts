/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by graphwire maps to a base error type, a domain
 * and an `isExpected` flag. Expected errors describe bad input (a malformed
 * document, a misconfigured type); unexpected ones describe failures of a
 * collaborator or of the library itself.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: config, document, relationship, materialization, collection, internal
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ConfigurationError"
  | "MalformedDocumentError"
  | "RelationshipFetchError"
  | "MaterializationError"
  | "UnsupportedOperationError"
  | "CollectionAccessError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError" as const,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // CONFIGURATION ERRORS - Type registration and converter options
  // ============================================================================
  CONFIG_INVALID_REGISTRATION: {
    domain: "config",
    baseType: "ConfigurationError" as const,
    isExpected: true,
    title: "Invalid type registration",
    description: "The registration options for a resource class are invalid",
  },
  CONFIG_MISSING_ID: {
    domain: "config",
    baseType: "ConfigurationError" as const,
    isExpected: true,
    title: "Missing identifier field",
    description: "Every resource class must declare exactly one id field",
  },
  CONFIG_DUPLICATE_ID: {
    domain: "config",
    baseType: "ConfigurationError" as const,
    isExpected: true,
    title: "Duplicate identifier field",
    description: "Only one id field is allowed per resource class",
  },
  CONFIG_DUPLICATE_LINKS: {
    domain: "config",
    baseType: "ConfigurationError" as const,
    isExpected: true,
    title: "Duplicate links field",
    description: "Only one links field is allowed per resource class",
  },
  CONFIG_DUPLICATE_META: {
    domain: "config",
    baseType: "ConfigurationError" as const,
    isExpected: true,
    title: "Duplicate meta field",
    description: "Only one meta field is allowed per resource class",
  },
  CONFIG_MISSING_REL_TYPE: {
    domain: "config",
    baseType: "ConfigurationError" as const,
    isExpected: true,
    title: "Missing link relation",
    description: "A resolvable relationship must name the link relation to follow",
  },
  CONFIG_DUPLICATE_TYPE: {
    domain: "config",
    baseType: "ConfigurationError" as const,
    isExpected: true,
    title: "Duplicate type name",
    description: "The resource type name is already registered to another class",
  },
  CONFIG_UNREGISTERED_TYPE: {
    domain: "config",
    baseType: "ConfigurationError" as const,
    isExpected: true,
    title: "Unregistered type",
    description: "The class is not registered with the type registry",
  },
  CONFIG_REGISTRY_SEALED: {
    domain: "config",
    baseType: "ConfigurationError" as const,
    isExpected: true,
    title: "Registry sealed",
    description: "Types cannot be registered once conversions have started",
  },
  CONFIG_REFERENCE_FIELD_TYPE: {
    domain: "config",
    baseType: "ConfigurationError" as const,
    isExpected: true,
    title: "Invalid reference field",
    description: "The reference resolution strategy requires a string field",
  },
  CONFIG_INVALID_OPTIONS: {
    domain: "config",
    baseType: "ConfigurationError" as const,
    isExpected: true,
    title: "Invalid options",
    description: "The converter or resolver options failed validation",
  },
  CONFIG_NO_LINK_RESOLVER: {
    domain: "config",
    baseType: "ConfigurationError" as const,
    isExpected: true,
    title: "No link resolver",
    description: "No link resolver is registered for the requested type",
  },

  // ============================================================================
  // DOCUMENT ERRORS - Wire envelope shape
  // ============================================================================
  DOCUMENT_INVALID_JSON: {
    domain: "document",
    baseType: "MalformedDocumentError" as const,
    isExpected: true,
    title: "Invalid JSON",
    description: "The document is not valid JSON",
  },
  DOCUMENT_MALFORMED: {
    domain: "document",
    baseType: "MalformedDocumentError" as const,
    isExpected: true,
    title: "Malformed document",
    description: "The document does not match the resource document envelope",
  },
  DOCUMENT_HAS_ERRORS: {
    domain: "document",
    baseType: "MalformedDocumentError" as const,
    isExpected: true,
    title: "Error document",
    description: "The document carries errors where primary data was expected",
  },
  DOCUMENT_EXPECTED_OBJECT: {
    domain: "document",
    baseType: "MalformedDocumentError" as const,
    isExpected: true,
    title: "Expected single resource",
    description: "The primary data must be a single resource object",
  },
  DOCUMENT_EXPECTED_COLLECTION: {
    domain: "document",
    baseType: "MalformedDocumentError" as const,
    isExpected: true,
    title: "Expected resource collection",
    description: "The primary data must be an array of resource objects",
  },

  // ============================================================================
  // RELATIONSHIP ERRORS - Remote dereference of relationship links
  // ============================================================================
  RELATIONSHIP_FETCH_FAILED: {
    domain: "relationship",
    baseType: "RelationshipFetchError" as const,
    isExpected: false,
    title: "Relationship fetch failed",
    description: "The link resolver failed to fetch a relationship link",
  },
  RELATIONSHIP_ERROR_DOCUMENT: {
    domain: "relationship",
    baseType: "RelationshipFetchError" as const,
    isExpected: false,
    title: "Relationship returned errors",
    description: "The document fetched for a relationship link carries errors",
  },
  RELATIONSHIP_NO_PRIMARY_DATA: {
    domain: "relationship",
    baseType: "RelationshipFetchError" as const,
    isExpected: false,
    title: "Relationship without primary data",
    description: "The document fetched for a relationship link has no primary data",
  },

  // ============================================================================
  // MATERIALIZATION ERRORS - Building typed instances from resource nodes
  // ============================================================================
  MATERIALIZATION_CONSTRUCT_FAILED: {
    domain: "materialization",
    baseType: "MaterializationError" as const,
    isExpected: false,
    title: "Construction failed",
    description: "The resource class could not be instantiated",
  },
  MATERIALIZATION_INVALID_ATTRIBUTES: {
    domain: "materialization",
    baseType: "MaterializationError" as const,
    isExpected: true,
    title: "Invalid attributes",
    description: "The resource attributes failed the registered attribute schema",
  },
  MATERIALIZATION_INVALID_META: {
    domain: "materialization",
    baseType: "MaterializationError" as const,
    isExpected: true,
    title: "Invalid meta",
    description: "The meta object failed the registered meta schema",
  },
  MATERIALIZATION_TYPE_MISMATCH: {
    domain: "materialization",
    baseType: "MaterializationError" as const,
    isExpected: true,
    title: "Identity type mismatch",
    description: "A resource identity was already read as an instance of a different class",
  },

  // ============================================================================
  // COLLECTION ERRORS - Paginated resource list access
  // ============================================================================
  COLLECTION_READ_ONLY: {
    domain: "collection",
    baseType: "UnsupportedOperationError" as const,
    isExpected: true,
    title: "Read-only collection",
    description: "The paginated resource list cannot be modified",
  },
  COLLECTION_UNSUPPORTED: {
    domain: "collection",
    baseType: "UnsupportedOperationError" as const,
    isExpected: true,
    title: "Unsupported collection operation",
    description: "Collect the elements into an array before using this operation",
  },
  COLLECTION_NEGATIVE_INDEX: {
    domain: "collection",
    baseType: "CollectionAccessError" as const,
    isExpected: true,
    title: "Negative index",
    description: "Indices must be zero or greater",
  },
  COLLECTION_INDEX_OUT_OF_BOUNDS: {
    domain: "collection",
    baseType: "CollectionAccessError" as const,
    isExpected: true,
    title: "Index out of bounds",
    description: "The index lies beyond the end of the collection",
  },
  COLLECTION_INVALID_RANGE: {
    domain: "collection",
    baseType: "CollectionAccessError" as const,
    isExpected: true,
    title: "Invalid range",
    description: "The requested range does not fit the collection",
  },
  COLLECTION_NO_SUCH_ELEMENT: {
    domain: "collection",
    baseType: "CollectionAccessError" as const,
    isExpected: true,
    title: "No such element",
    description: "The iterator has no more elements",
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
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
