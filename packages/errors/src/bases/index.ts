export { CollectionAccessError } from "./collection-access-error.js";
export { ConfigurationError } from "./configuration-error.js";
export { InternalError } from "./internal-error.js";
export { MalformedDocumentError } from "./malformed-document-error.js";
export { MaterializationError } from "./materialization-error.js";
export { RelationshipFetchError } from "./relationship-fetch-error.js";
export { UnsupportedOperationError } from "./unsupported-operation-error.js";
