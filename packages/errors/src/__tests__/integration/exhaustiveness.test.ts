import { describe, expect, it } from "vitest";
import {
  type GraphwireError,
  hasCode,
  isCollectionAccessError,
  isConfigurationError,
  isExpectedError,
  isInternalError,
  isMalformedDocumentError,
  isMaterializationError,
  isRelationshipFetchError,
  isUnsupportedOperationError,
} from "../../index.js";
import { sampleErrors } from "../fixtures/sample-errors.js";

describe("Exhaustive type checking with _tag discriminant", () => {
  it("should enable exhaustive switch on the base _tag values", () => {
    function handleError(error: GraphwireError): string {
      switch (error._tag) {
        case "ConfigurationError":
          return "configuration";
        case "MalformedDocumentError":
          return "malformed";
        case "RelationshipFetchError":
          return "relationship";
        case "MaterializationError":
          return "materialization";
        case "UnsupportedOperationError":
          return "unsupported";
        case "CollectionAccessError":
          return "access";
        case "InternalError":
          return "internal";
        default: {
          const exhaustive: never = error._tag;
          throw new Error(`Exhaustive check failed: ${String(exhaustive)}`);
        }
      }
    }

    expect(handleError(sampleErrors.configuration)).toBe("configuration");
    expect(handleError(sampleErrors.malformed)).toBe("malformed");
    expect(handleError(sampleErrors.relationship)).toBe("relationship");
    expect(handleError(sampleErrors.materialization)).toBe("materialization");
    expect(handleError(sampleErrors.unsupported)).toBe("unsupported");
    expect(handleError(sampleErrors.collectionAccess)).toBe("access");
    expect(handleError(sampleErrors.internal)).toBe("internal");
  });
});

describe("type guards", () => {
  it("should match exactly one guard per base type", () => {
    const guards = [
      isConfigurationError,
      isMalformedDocumentError,
      isRelationshipFetchError,
      isMaterializationError,
      isUnsupportedOperationError,
      isCollectionAccessError,
      isInternalError,
    ];

    for (const error of Object.values(sampleErrors)) {
      expect(guards.filter((guard) => guard(error))).toHaveLength(1);
    }
  });

  it("hasCode narrows by code", () => {
    expect(hasCode(sampleErrors.collectionAccess, "COLLECTION_NEGATIVE_INDEX")).toBe(true);
    expect(hasCode(sampleErrors.collectionAccess, "COLLECTION_INVALID_RANGE")).toBe(false);
  });

  it("isExpectedError follows the catalog", () => {
    expect(isExpectedError(sampleErrors.malformed)).toBe(true);
    expect(isExpectedError(sampleErrors.relationship)).toBe(false);
    expect(isExpectedError(new Error("plain"))).toBe(false);
    expect(isExpectedError(undefined)).toBe(false);
  });
});
