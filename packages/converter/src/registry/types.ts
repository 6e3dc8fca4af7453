import type { z } from "zod";
import type { ResolutionStrategy, ResourceClass } from "../types.js";
import type { FieldDeclaration, MetaSchema } from "./fields.js";

export type AttributesSchema = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

/**
 * Registration options for one resource class.
 */
export interface ResourceRegistration<T extends object> {
  /** Wire type name, e.g. "articles" */
  readonly type: string;
  readonly fields: { readonly [K in keyof T]?: FieldDeclaration };
  /** Optional schema applied to the attribute bag before binding */
  readonly attributes?: AttributesSchema;
}

/**
 * Reads and writes one property of a resource instance.
 */
export interface FieldAccessor {
  readonly key: string;
  get(target: object): unknown;
  set(target: object, value: unknown): void;
}

export interface RelationshipDescriptor {
  readonly name: string;
  readonly field: FieldAccessor;
  readonly target: () => ResourceClass;
  readonly resolve: boolean;
  readonly relType: string | undefined;
  readonly strategy: ResolutionStrategy;
  readonly serialise: boolean;
}

export interface MetaDescriptor {
  readonly field: FieldAccessor;
  readonly schema: MetaSchema | undefined;
}

/**
 * Static serialization metadata of one registered class.
 */
export interface TypeDescriptor {
  readonly typeName: string;
  readonly cls: ResourceClass;
  readonly id: FieldAccessor;
  readonly links: FieldAccessor | undefined;
  readonly meta: MetaDescriptor | undefined;
  /** Keyed by wire relationship name, in declaration order */
  readonly relationships: ReadonlyMap<string, RelationshipDescriptor>;
  readonly attributes: AttributesSchema | undefined;
  /** Properties that never bind from or serialize to the attribute bag */
  readonly reservedFields: ReadonlySet<string>;
}

/**
 * Source of type descriptors consumed by the converter.
 */
export interface TypeDescriptorProvider {
  describe(cls: ResourceClass): TypeDescriptor | undefined;
  lookup(typeName: string): TypeDescriptor | undefined;
  /** Descriptor of the instance's class, or of its nearest registered ancestor */
  describeInstance(instance: object): TypeDescriptor | undefined;
}
