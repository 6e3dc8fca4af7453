import type { Links, Meta } from "../types.js";
import { toLinks } from "./parse.js";
import type { WireRelationship, WireResource, WireResourceIdentifier } from "./schema.js";

/**
 * `(type, id)` pair that identifies a resource. Wire ids are always strings.
 */
export interface ResourceIdentity {
  readonly type: string;
  readonly id: string;
}

/**
 * Relationship linkage as found on the wire:
 * - `undefined` when the relationship carries no `data` member
 * - `null` for an empty to-one relationship
 * - one identity or an ordered array of identities otherwise
 */
export type Linkage = ResourceIdentity | readonly ResourceIdentity[] | null | undefined;

export interface RelationshipEntry {
  readonly name: string;
  readonly data: Linkage;
  readonly links: Links | undefined;
  readonly meta: Meta | undefined;
}

export function identityKey(identity: ResourceIdentity): string {
  return `${identity.type}:${identity.id}`;
}

export function toIdentity(identifier: WireResourceIdentifier): ResourceIdentity {
  return { type: identifier.type, id: String(identifier.id) };
}

function toLinkage(data: WireRelationship["data"]): Linkage {
  if (data === undefined || data === null) {
    return data;
  }
  if (Array.isArray(data)) {
    return data.map(toIdentity);
  }
  return toIdentity(data);
}

/**
 * Immutable view of one wire resource object. Constructed per document
 * parse and discarded after materialization.
 */
export class ResourceNode implements ResourceIdentity {
  readonly type: string;
  readonly id: string;
  readonly key: string;
  readonly attributes: Readonly<Record<string, unknown>> | undefined;
  readonly relationships: ReadonlyMap<string, RelationshipEntry>;
  readonly links: Links | undefined;
  readonly meta: Meta | undefined;

  constructor(resource: WireResource) {
    this.type = resource.type;
    this.id = String(resource.id);
    this.key = identityKey(this);
    this.attributes = resource.attributes;
    this.links = toLinks(resource.links);
    this.meta = resource.meta;

    const relationships = new Map<string, RelationshipEntry>();
    for (const [name, rel] of Object.entries(resource.relationships ?? {})) {
      relationships.set(name, {
        name,
        data: toLinkage(rel.data),
        links: toLinks(rel.links),
        meta: rel.meta,
      });
    }
    this.relationships = relationships;
  }
}
