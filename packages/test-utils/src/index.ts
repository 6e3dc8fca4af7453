export const PACKAGE_NAME = "@graphwire/test-utils" as const;

export {
  type DocumentExtras,
  type DocumentFixture,
  type ErrorFixture,
  type IdentifierFixture,
  type RelationshipFixture,
  type ResourceFixture,
  encodeDocument,
  errorDocument,
  pageDocument,
  resourceDocument,
} from "./documents.js";
export { RecordingResolver, type RecordedResponse } from "./recording-resolver.js";
