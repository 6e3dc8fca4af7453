import { ConfigurationError } from "@graphwire/errors";
import { z } from "zod";
import type { ResourceClass } from "../types.js";
import type { FieldDeclaration } from "./fields.js";
import type {
  FieldAccessor,
  MetaDescriptor,
  RelationshipDescriptor,
  ResourceRegistration,
  TypeDescriptor,
  TypeDescriptorProvider,
} from "./types.js";

const RegistrationSchema = z.object({
  type: z.string().min(1),
  fields: z.record(z.object({ kind: z.enum(["id", "links", "meta", "relationship"]) }).passthrough().optional()),
});

function accessor(key: string): FieldAccessor {
  return {
    key,
    get: (target) => Reflect.get(target, key),
    set: (target, value) => {
      Reflect.set(target, key, value);
    },
  };
}

/**
 * Process-wide table of resource classes.
 *
 * Built once before any conversion, then sealed: the first conversion seals
 * the registry and every later `register` call fails.
 */
export class TypeRegistry implements TypeDescriptorProvider {
  private readonly byClass = new Map<unknown, TypeDescriptor>();
  private readonly byName = new Map<string, TypeDescriptor>();
  private sealed = false;

  /**
   * @throws ConfigurationError when the registration is invalid
   */
  register<T extends object>(
    cls: ResourceClass<T>,
    registration: ResourceRegistration<T>,
  ): TypeDescriptor {
    const className = cls.name || "<anonymous>";

    if (this.sealed) {
      throw new ConfigurationError({
        code: "CONFIG_REGISTRY_SEALED",
        message: `Cannot register '${className}': the type registry is sealed`,
        typeName: className,
      });
    }

    const parsed = RegistrationSchema.safeParse(registration);
    if (!parsed.success) {
      throw new ConfigurationError({
        code: "CONFIG_INVALID_REGISTRATION",
        message: `Invalid registration for '${className}': ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`,
        typeName: className,
      });
    }

    if (this.byClass.has(cls)) {
      throw new ConfigurationError({
        code: "CONFIG_INVALID_REGISTRATION",
        message: `'${className}' is already registered`,
        typeName: className,
      });
    }

    const existing = this.byName.get(registration.type);
    if (existing) {
      throw new ConfigurationError({
        code: "CONFIG_DUPLICATE_TYPE",
        message: `Type '${registration.type}' is already registered to '${existing.cls.name}'`,
        typeName: registration.type,
      });
    }

    const descriptor = this.buildDescriptor(cls, className, registration);
    this.byClass.set(cls, descriptor);
    this.byName.set(descriptor.typeName, descriptor);
    return descriptor;
  }

  private buildDescriptor<T extends object>(
    cls: ResourceClass<T>,
    className: string,
    registration: ResourceRegistration<T>,
  ): TypeDescriptor {
    const idKeys: string[] = [];
    const linkKeys: string[] = [];
    const metaFields: MetaDescriptor[] = [];
    const relationships = new Map<string, RelationshipDescriptor>();

    const declarations: [string, FieldDeclaration | undefined][] = Object.entries(
      registration.fields,
    );

    for (const [key, declaration] of declarations) {
      if (!declaration) continue;

      switch (declaration.kind) {
        case "id":
          idKeys.push(key);
          break;
        case "links":
          linkKeys.push(key);
          break;
        case "meta":
          metaFields.push({ field: accessor(key), schema: declaration.schema });
          break;
        case "relationship": {
          if (declaration.resolve && !declaration.relType) {
            throw new ConfigurationError({
              code: "CONFIG_MISSING_REL_TYPE",
              message: `Relationship '${declaration.name}' on ${className}#${key} with 'resolve: true' must set relType`,
              typeName: className,
            });
          }
          if (relationships.has(declaration.name)) {
            throw new ConfigurationError({
              code: "CONFIG_INVALID_REGISTRATION",
              message: `Relationship '${declaration.name}' is declared twice on '${className}'`,
              typeName: className,
            });
          }
          relationships.set(declaration.name, {
            name: declaration.name,
            field: accessor(key),
            target: declaration.target,
            resolve: declaration.resolve,
            relType: declaration.relType,
            strategy: declaration.strategy,
            serialise: declaration.serialise,
          });
          break;
        }
      }
    }

    const [idKey] = idKeys;
    if (idKey === undefined) {
      throw new ConfigurationError({
        code: "CONFIG_MISSING_ID",
        message: `Resource class '${className}' must declare an id field`,
        typeName: className,
      });
    }
    if (idKeys.length > 1) {
      throw new ConfigurationError({
        code: "CONFIG_DUPLICATE_ID",
        message: `Only one id field is allowed for type '${className}'`,
        typeName: className,
      });
    }
    if (linkKeys.length > 1) {
      throw new ConfigurationError({
        code: "CONFIG_DUPLICATE_LINKS",
        message: `Only one links field is allowed for type '${className}'`,
        typeName: className,
      });
    }
    if (metaFields.length > 1) {
      throw new ConfigurationError({
        code: "CONFIG_DUPLICATE_META",
        message: `Only one meta field is allowed for type '${className}'`,
        typeName: className,
      });
    }

    const [linkKey] = linkKeys;
    const [metaField] = metaFields;
    const reservedFields = new Set<string>([idKey]);
    if (linkKey !== undefined) reservedFields.add(linkKey);
    if (metaField) reservedFields.add(metaField.field.key);
    for (const rel of relationships.values()) {
      reservedFields.add(rel.field.key);
    }

    return {
      typeName: registration.type,
      cls,
      id: accessor(idKey),
      links: linkKey === undefined ? undefined : accessor(linkKey),
      meta: metaField,
      relationships,
      attributes: registration.attributes,
      reservedFields,
    };
  }

  /**
   * Freeze the registry. Every relationship target must be registered.
   * Idempotent.
   *
   * @throws ConfigurationError (CONFIG_UNREGISTERED_TYPE)
   */
  seal(): void {
    if (this.sealed) {
      return;
    }
    for (const descriptor of this.byClass.values()) {
      for (const rel of descriptor.relationships.values()) {
        const target = rel.target();
        if (!this.byClass.has(target)) {
          throw new ConfigurationError({
            code: "CONFIG_UNREGISTERED_TYPE",
            message: `Relationship '${rel.name}' on '${descriptor.typeName}' targets unregistered class '${target.name}'`,
            typeName: descriptor.typeName,
          });
        }
      }
    }
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  has(cls: ResourceClass): boolean {
    return this.byClass.has(cls);
  }

  describe(cls: ResourceClass): TypeDescriptor | undefined {
    return this.byClass.get(cls);
  }

  lookup(typeName: string): TypeDescriptor | undefined {
    return this.byName.get(typeName);
  }

  describeInstance(instance: object): TypeDescriptor | undefined {
    const exact = this.byClass.get(instance.constructor);
    if (exact) {
      return exact;
    }
    for (const descriptor of this.byClass.values()) {
      if (instance instanceof descriptor.cls) {
        return descriptor;
      }
    }
    return undefined;
  }

  typeNames(): string[] {
    return [...this.byName.keys()];
  }
}

/**
 * Describe a class or fail with CONFIG_UNREGISTERED_TYPE.
 */
export function requireDescriptor(
  provider: TypeDescriptorProvider,
  cls: ResourceClass,
): TypeDescriptor {
  const descriptor = provider.describe(cls);
  if (!descriptor) {
    throw new ConfigurationError({
      code: "CONFIG_UNREGISTERED_TYPE",
      message: `Class '${cls.name}' is not registered`,
      typeName: cls.name,
    });
  }
  return descriptor;
}
