import { ConfigurationError } from "@graphwire/errors";
import { identityKey } from "./document/resource-node.js";
import type { NamingStrategy } from "./naming.js";
import { PaginatedResourceList } from "./pagination/paginated-resource-list.js";
import type { RelationshipDescriptor, TypeDescriptor, TypeDescriptorProvider } from "./registry/types.js";

export interface ResourceIdentifierObject {
  type: string;
  id: string;
}

export interface RelationshipObject {
  data?: ResourceIdentifierObject | ResourceIdentifierObject[];
  links?: Record<string, string>;
}

export interface ResourceObject {
  type: string;
  id?: string;
  attributes?: Record<string, unknown>;
  relationships?: Record<string, RelationshipObject>;
  meta?: Record<string, unknown>;
}

export interface SingleResourceDocument {
  data: ResourceObject;
  included?: ResourceObject[];
}

export interface CollectionResourceDocument {
  data: ResourceObject[];
  included?: ResourceObject[];
}

export interface SerializeOptions {
  /** Add every reachable related resource to `included` (default false) */
  readonly include?: boolean;
}

const encoder = new TextEncoder();

export function encodeJson(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function wireId(value: unknown): string | undefined {
  return typeof value === "string" || typeof value === "number" ? String(value) : undefined;
}

/**
 * Typed objects → resource documents. Only relationships registered with
 * `serialise` are written; related objects without an id are left out.
 */
export class ResourceSerializer {
  private readonly types: TypeDescriptorProvider;
  private readonly naming: NamingStrategy;

  constructor(types: TypeDescriptorProvider, naming: NamingStrategy) {
    this.types = types;
    this.naming = naming;
  }

  toDocument(resource: object, options: SerializeOptions = {}): SingleResourceDocument {
    const document: SingleResourceDocument = { data: this.toResourceObject(resource) };
    if (options.include) {
      document.included = this.collectIncluded([resource]);
    }
    return document;
  }

  toCollectionDocument(resources: readonly object[], options: SerializeOptions = {}): CollectionResourceDocument {
    const document: CollectionResourceDocument = {
      data: resources.map((resource) => this.toResourceObject(resource)),
    };
    if (options.include) {
      document.included = this.collectIncluded(resources);
    }
    return document;
  }

  private describe(resource: object): TypeDescriptor {
    const descriptor = this.types.describeInstance(resource);
    if (!descriptor) {
      throw new ConfigurationError({
        code: "CONFIG_UNREGISTERED_TYPE",
        message: `Class '${resource.constructor.name}' is not registered`,
        typeName: resource.constructor.name,
      });
    }
    return descriptor;
  }

  private toResourceObject(resource: object): ResourceObject {
    const descriptor = this.describe(resource);
    const result: ResourceObject = { type: descriptor.typeName };

    const id = wireId(descriptor.id.get(resource));
    if (id !== undefined) {
      result.id = id;
    }

    const attributes: Record<string, unknown> = {};
    for (const [fieldName, value] of Object.entries(resource)) {
      if (descriptor.reservedFields.has(fieldName) || value === null || value === undefined) {
        continue;
      }
      if (typeof value === "function") {
        continue;
      }
      attributes[this.naming.toWireName(fieldName)] = value;
    }
    if (Object.keys(attributes).length > 0) {
      result.attributes = attributes;
    }

    const relationships: Record<string, RelationshipObject> = {};
    for (const rel of descriptor.relationships.values()) {
      const relationship = this.toRelationshipObject(resource, rel);
      if (relationship) {
        relationships[rel.name] = relationship;
      }
    }
    if (Object.keys(relationships).length > 0) {
      result.relationships = relationships;
    }

    if (descriptor.meta) {
      const meta = descriptor.meta.field.get(resource);
      if (isRecord(meta)) {
        result.meta = meta;
      }
    }
    return result;
  }

  private toRelationshipObject(resource: object, rel: RelationshipDescriptor): RelationshipObject | undefined {
    if (!rel.serialise) {
      return undefined;
    }
    const value = rel.field.get(resource);
    if (value === null || value === undefined || value instanceof PaginatedResourceList) {
      return undefined;
    }
    if (typeof value === "string") {
      return { links: { [rel.relType ?? "related"]: value } };
    }
    if (Array.isArray(value)) {
      const data: ResourceIdentifierObject[] = [];
      for (const element of value) {
        const identifier = this.toIdentifier(element);
        if (identifier) {
          data.push(identifier);
        }
      }
      return { data };
    }
    const identifier = this.toIdentifier(value);
    return identifier ? { data: identifier } : undefined;
  }

  private toIdentifier(value: unknown): ResourceIdentifierObject | undefined {
    if (typeof value !== "object" || value === null) {
      return undefined;
    }
    const descriptor = this.describe(value);
    const id = wireId(descriptor.id.get(value));
    return id === undefined ? undefined : { type: descriptor.typeName, id };
  }

  private relatedObjects(resource: object): object[] {
    const descriptor = this.describe(resource);
    const related: object[] = [];
    for (const rel of descriptor.relationships.values()) {
      if (!rel.serialise) {
        continue;
      }
      const value = rel.field.get(resource);
      const candidates: unknown[] = Array.isArray(value) ? value : [value];
      for (const candidate of candidates) {
        if (typeof candidate === "object" && candidate !== null && !(candidate instanceof PaginatedResourceList)) {
          related.push(candidate);
        }
      }
    }
    return related;
  }

  /**
   * Every resource reachable from the roots through serialised
   * relationships, once per identity, roots excluded.
   */
  private collectIncluded(roots: readonly object[]): ResourceObject[] {
    const seenObjects = new Set<object>(roots);
    const seenKeys = new Set<string>();
    for (const root of roots) {
      const identifier = this.toIdentifier(root);
      if (identifier) {
        seenKeys.add(identityKey(identifier));
      }
    }

    const included: ResourceObject[] = [];
    const queue = [...roots];
    for (let resource = queue.shift(); resource !== undefined; resource = queue.shift()) {
      for (const related of this.relatedObjects(resource)) {
        if (seenObjects.has(related)) {
          continue;
        }
        seenObjects.add(related);
        queue.push(related);

        const identifier = this.toIdentifier(related);
        if (!identifier || seenKeys.has(identityKey(identifier))) {
          continue;
        }
        seenKeys.add(identityKey(identifier));
        included.push(this.toResourceObject(related));
      }
    }
    return included;
  }
}
