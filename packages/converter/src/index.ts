/**
 * @graphwire/converter
 *
 * Reads resource documents into typed, linked object graphs and writes them
 * back. Relationships resolve from inline linkage, included resources or
 * relationship links; collections page lazily through `next` links.
 */

// ============================================================================
// CONVERTER
// ============================================================================

export {
  type ReadDocumentResult,
  ResourceConverter,
  type SafeReadResult,
} from "./resource-converter.js";

export {
  type CollectionResourceDocument,
  type RelationshipObject,
  type ResourceIdentifierObject,
  type ResourceObject,
  ResourceSerializer,
  type SerializeOptions,
  type SingleResourceDocument,
} from "./serializer.js";

export { ResourceMaterializer } from "./materializer.js";

// ============================================================================
// REGISTRY
// ============================================================================

export {
  type FieldDeclaration,
  type IdField,
  type LinksField,
  type MetaField,
  type MetaSchema,
  type RelationshipField,
  type RelationshipOptions,
  id,
  links,
  meta,
  relationship,
} from "./registry/fields.js";
export { TypeRegistry, requireDescriptor } from "./registry/type-registry.js";
export type {
  AttributesSchema,
  FieldAccessor,
  MetaDescriptor,
  RelationshipDescriptor,
  ResourceRegistration,
  TypeDescriptor,
  TypeDescriptorProvider,
} from "./registry/types.js";

// ============================================================================
// DOCUMENTS
// ============================================================================

export {
  formatApiErrors,
  parseDocument,
  toApiErrors,
  toLink,
  toLinks,
} from "./document/parse.js";
export {
  type Linkage,
  type RelationshipEntry,
  type ResourceIdentity,
  ResourceNode,
  identityKey,
} from "./document/resource-node.js";
export { DocumentScope } from "./document/scope.js";
export {
  DocumentSchema,
  type WireDocument,
  type WireResource,
} from "./document/schema.js";

// ============================================================================
// RESOLUTION
// ============================================================================

export { ConversionContext } from "./resolution/conversion-context.js";
export {
  RelationshipResolver,
  type ResolutionEnvironment,
} from "./resolution/relationship-resolver.js";
export { ResolutionCache } from "./resolution/resolution-cache.js";
export { type LinkVisit, ResolverState } from "./resolution/resolver-state.js";
export {
  DEFAULT_TIMEOUT_MS,
  FetchLinkResolver,
  RESOURCE_MEDIA_TYPE,
} from "./resolvers/fetch-link-resolver.js";

// ============================================================================
// PAGINATION
// ============================================================================

export {
  type Equality,
  PaginatedResourceList,
} from "./pagination/paginated-resource-list.js";
export { type AdvanceResult, PagingIterator } from "./pagination/paging-iterator.js";
export { type PageLoader, ResourcePage } from "./pagination/resource-page.js";
export { ResourceStream } from "./pagination/resource-stream.js";

// ============================================================================
// OPTIONS, LOGGING, TRACING
// ============================================================================

export {
  type ConverterOptions,
  ConverterOptionsSchema,
  type FetchLinkResolverConfig,
  FetchLinkResolverConfigSchema,
} from "./validation.js";
export {
  type ConverterLogger,
  DEFAULT_LOG_TAG,
  type LogContext,
  type LogLevel,
  createConsoleLogger,
  isConverterLogger,
  silentLogger,
} from "./logger.js";
export { type NamingStrategy, createNamingStrategy } from "./naming.js";
export {
  ATTR_LINK,
  ATTR_RELATIONSHIP,
  type LinkFetchSpan,
  type LinkFetchTarget,
  SPAN_PAGE_FETCH,
  SPAN_RELATIONSHIP_RESOLVE,
  traceLinkFetch,
} from "./telemetry.js";

export {
  type AttributeNaming,
  type Link,
  type LinkResolver,
  type Links,
  type Meta,
  type ResolutionStrategy,
  type ResourceClass,
  type UnresolvedLinkage,
  UNKNOWN_SIZE,
  type WireInput,
} from "./types.js";
