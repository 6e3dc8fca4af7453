import { MaterializationError, type ValidationIssue } from "@graphwire/errors";
import type { ZodIssue } from "zod";
import type { ResourceNode } from "./document/resource-node.js";
import type { NamingStrategy } from "./naming.js";
import type { TypeDescriptor } from "./registry/types.js";
import type { Meta, ResourceClass } from "./types.js";

function toIssue(issue: ZodIssue): ValidationIssue {
  return { path: issue.path.join("."), message: issue.message, code: issue.code };
}

function describeIssues(issues: readonly ValidationIssue[]): string {
  return issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join("; ");
}

/**
 * Turns one resource node into a typed instance. Relationships are left
 * alone; the relationship resolver fills them afterwards.
 */
export class ResourceMaterializer {
  private readonly naming: NamingStrategy;

  constructor(naming: NamingStrategy) {
    this.naming = naming;
  }

  /**
   * @throws MaterializationError when construction or schema validation fails
   */
  materialize<T extends object>(node: ResourceNode, cls: ResourceClass<T>, descriptor: TypeDescriptor): T {
    const instance = this.construct(cls, descriptor.typeName);

    this.bindAttributes(instance, node, descriptor);
    descriptor.id.set(instance, node.id);

    if (descriptor.links && node.links) {
      descriptor.links.set(instance, node.links);
    }
    if (node.meta) {
      this.bindMeta(instance, node.meta, descriptor);
    }
    return instance;
  }

  /**
   * Instance carrying nothing but its id.
   */
  stub<T extends object>(id: string, cls: ResourceClass<T>, descriptor: TypeDescriptor): T {
    const instance = this.construct(cls, descriptor.typeName);
    descriptor.id.set(instance, id);
    return instance;
  }

  /**
   * Store a meta object on the instance's meta field, if the class has one.
   * Returns false when the class declares no meta field.
   */
  bindMeta(instance: object, meta: Meta, descriptor: TypeDescriptor): boolean {
    if (!descriptor.meta) {
      return false;
    }
    const { field, schema } = descriptor.meta;
    if (!schema) {
      field.set(instance, meta);
      return true;
    }

    const parsed = schema.safeParse(meta);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(toIssue);
      throw new MaterializationError({
        code: "MATERIALIZATION_INVALID_META",
        message: `Meta of '${descriptor.typeName}' failed validation: ${describeIssues(issues)}`,
        resourceType: descriptor.typeName,
        issues,
      });
    }
    field.set(instance, parsed.data);
    return true;
  }

  private construct<T extends object>(cls: ResourceClass<T>, typeName: string): T {
    try {
      return new cls();
    } catch (error) {
      throw new MaterializationError({
        code: "MATERIALIZATION_CONSTRUCT_FAILED",
        message: `Could not construct '${cls.name}' for type '${typeName}': ${
          error instanceof Error ? error.message : String(error)
        }`,
        resourceType: typeName,
        cause: error,
      });
    }
  }

  private bindAttributes(instance: object, node: ResourceNode, descriptor: TypeDescriptor): void {
    if (!node.attributes) {
      return;
    }

    let bag: Record<string, unknown> = {};
    for (const [wireKey, value] of Object.entries(node.attributes)) {
      const fieldName = this.naming.toFieldName(wireKey);
      if (!descriptor.reservedFields.has(fieldName)) {
        bag[fieldName] = value;
      }
    }

    if (descriptor.attributes) {
      const parsed = descriptor.attributes.safeParse(bag);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(toIssue);
        throw new MaterializationError({
          code: "MATERIALIZATION_INVALID_ATTRIBUTES",
          message: `Attributes of ${node.type}:${node.id} failed validation: ${describeIssues(issues)}`,
          resourceType: node.type,
          issues,
        });
      }
      bag = parsed.data;
    }

    for (const [fieldName, value] of Object.entries(bag)) {
      Reflect.set(instance, fieldName, value);
    }
  }
}
