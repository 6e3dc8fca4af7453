/**
 * Field declarations used when registering a resource class. Each entry of
 * a registration's `fields` map assigns one role to one property.
 *
 * @example
 * registry.register(Article, {
 *   type: "articles",
 *   fields: {
 *     id: id(),
 *     author: relationship("author", () => Person),
 *     comments: relationship("comments", () => Comment, { resolve: true, relType: "related" }),
 *     links: links(),
 *   },
 * });
 */

import type { z } from "zod";
import type { ResolutionStrategy, ResourceClass } from "../types.js";

export type MetaSchema = z.ZodType<unknown, z.ZodTypeDef, unknown>;

export interface IdField {
  readonly kind: "id";
}

export interface LinksField {
  readonly kind: "links";
}

export interface MetaField {
  readonly kind: "meta";
  readonly schema: MetaSchema | undefined;
}

export interface RelationshipField {
  readonly kind: "relationship";
  readonly name: string;
  readonly target: () => ResourceClass;
  readonly resolve: boolean;
  readonly relType: string | undefined;
  readonly strategy: ResolutionStrategy;
  readonly serialise: boolean;
}

export type FieldDeclaration = IdField | LinksField | MetaField | RelationshipField;

export interface RelationshipOptions {
  /** Dereference the relationship link through a link resolver (default false) */
  readonly resolve?: boolean;
  /** Link relation looked up in the relationship's links bag, e.g. "related" */
  readonly relType?: string;
  /** default "object" */
  readonly strategy?: ResolutionStrategy;
  /** Emit the relationship when serializing (default true) */
  readonly serialise?: boolean;
}

export function id(): IdField {
  return { kind: "id" };
}

export function links(): LinksField {
  return { kind: "links" };
}

/**
 * @param schema - Optional schema the meta object must satisfy; its output is stored
 */
export function meta(schema?: MetaSchema): MetaField {
  return { kind: "meta", schema };
}

/**
 * @param name - Relationship name on the wire
 * @param target - Thunk returning the target class, so classes may refer to each other
 */
export function relationship(
  name: string,
  target: () => ResourceClass,
  options: RelationshipOptions = {},
): RelationshipField {
  return {
    kind: "relationship",
    name,
    target,
    resolve: options.resolve ?? false,
    relType: options.relType,
    strategy: options.strategy ?? "object",
    serialise: options.serialise ?? true,
  };
}
