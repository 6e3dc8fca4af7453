import { ConfigurationError, MaterializationError, RelationshipFetchError, getErrorMessage } from "@graphwire/errors";
import { formatApiErrors, parseDocument, toApiErrors, toLinks } from "../document/parse.js";
import {
  type RelationshipEntry,
  type ResourceIdentity,
  type ResourceNode,
  identityKey,
} from "../document/resource-node.js";
import type { WireDocument, WireResource } from "../document/schema.js";
import { DocumentScope } from "../document/scope.js";
import type { ConverterLogger } from "../logger.js";
import type { ResourceMaterializer } from "../materializer.js";
import { PaginatedResourceList } from "../pagination/paginated-resource-list.js";
import { type PageLoader, ResourcePage } from "../pagination/resource-page.js";
import { requireDescriptor } from "../registry/type-registry.js";
import type { RelationshipDescriptor, TypeDescriptor, TypeDescriptorProvider } from "../registry/types.js";
import { SPAN_RELATIONSHIP_RESOLVE, traceLinkFetch } from "../telemetry.js";
import type { LinkResolver, ResourceClass, UnresolvedLinkage } from "../types.js";
import type { ConversionContext } from "./conversion-context.js";

/**
 * Collaborators the resolver borrows from the converter.
 */
export interface ResolutionEnvironment {
  readonly types: TypeDescriptorProvider;
  readonly materializer: ResourceMaterializer;
  readonly logger: ConverterLogger;
  readonly unresolvedLinkage: UnresolvedLinkage;
  /** Typed resolver for the class, else the global one */
  resolverFor(cls: ResourceClass): LinkResolver | undefined;
  /** Loader for the pages following a fetched collection */
  pageLoader<T extends object>(cls: ResourceClass<T>): PageLoader<T>;
}

function isIdentityList(
  linkage: ResourceIdentity | readonly ResourceIdentity[],
): linkage is readonly ResourceIdentity[] {
  return Array.isArray(linkage);
}

/**
 * Builds the linked object graph of one document.
 *
 * Relationships are filled either from inline linkage, looked up in the
 * document's primary and included nodes, or by dereferencing a relationship
 * link through a {@link LinkResolver}. Instances are shared through the
 * context's resolution cache; links through its resolver state.
 */
export class RelationshipResolver {
  private readonly env: ResolutionEnvironment;

  constructor(env: ResolutionEnvironment) {
    this.env = env;
  }

  /**
   * Materialize a document's primary resources as `cls`, then every
   * included resource of a registered type not reached from them.
   */
  async readResources<T extends object>(
    document: WireDocument,
    primary: readonly WireResource[],
    cls: ResourceClass<T>,
    ctx: ConversionContext,
  ): Promise<T[]> {
    const scope = DocumentScope.fromDocument(document, primary);

    const resources: T[] = [];
    for (const node of scope.primary) {
      resources.push(await this.materializeInto(node, cls, scope, ctx));
    }

    for (const node of scope.included) {
      if (ctx.cache.has(node.key)) {
        continue;
      }
      const descriptor = this.env.types.lookup(node.type);
      if (descriptor) {
        await this.materializeInto(node, descriptor.cls, scope, ctx);
      }
    }
    return resources;
  }

  /**
   * Cached instance of the node's identity, or a fresh one with its
   * relationships resolved. The fresh instance enters the cache before its
   * relationships are walked.
   *
   * @throws MaterializationError (MATERIALIZATION_TYPE_MISMATCH) when the identity is cached as another class
   */
  async materializeInto<T extends object>(
    node: ResourceNode,
    cls: ResourceClass<T>,
    scope: DocumentScope,
    ctx: ConversionContext,
  ): Promise<T> {
    const cached = ctx.cache.get(node.key);
    if (cached instanceof cls) {
      return cached;
    }
    if (cached !== undefined) {
      throw new MaterializationError({
        code: "MATERIALIZATION_TYPE_MISMATCH",
        message: `Resource '${node.key}' was already read as '${cached.constructor.name}', not '${cls.name}'`,
        resourceType: node.type,
      });
    }

    const descriptor = requireDescriptor(this.env.types, cls);
    const instance = this.env.materializer.materialize(node, cls, descriptor);
    ctx.cache.put(node.key, instance);

    await this.resolveRelationships(instance, node, descriptor, scope, ctx);
    return instance;
  }

  private async resolveRelationships(
    instance: object,
    node: ResourceNode,
    descriptor: TypeDescriptor,
    scope: DocumentScope,
    ctx: ConversionContext,
  ): Promise<void> {
    for (const entry of node.relationships.values()) {
      const rel = descriptor.relationships.get(entry.name);
      if (!rel) {
        continue;
      }

      const target = rel.target();
      const resolver = this.env.resolverFor(target);
      if (rel.resolve && resolver && entry.links) {
        await this.resolveRemote(instance, node, rel, entry, target, resolver, ctx);
      } else {
        await this.resolveInline(instance, rel, entry, target, scope, ctx);
      }
    }
  }

  private async resolveRemote(
    instance: object,
    node: ResourceNode,
    rel: RelationshipDescriptor,
    entry: RelationshipEntry,
    target: ResourceClass,
    resolver: LinkResolver,
    ctx: ConversionContext,
  ): Promise<void> {
    const link = rel.relType === undefined ? undefined : entry.links?.[rel.relType];
    if (!link) {
      this.env.logger.debug("Relationship has no link for its relation, skipping", {
        resource: node.key,
        relationship: rel.name,
        relType: rel.relType,
      });
      return;
    }

    if (rel.strategy === "reference") {
      const current = rel.field.get(instance);
      if (current !== undefined && current !== null && typeof current !== "string") {
        throw new ConfigurationError({
          code: "CONFIG_REFERENCE_FIELD_TYPE",
          message: `Field '${rel.field.key}' of relationship '${rel.name}' must hold a string to use the reference strategy`,
          typeName: node.type,
        });
      }
      rel.field.set(instance, link.href);
      return;
    }

    const visit = ctx.state.lookup(link.href);
    if (visit.visited) {
      this.env.logger.debug("Relationship link already resolved", {
        link: link.href,
        relationship: rel.name,
      });
      if (visit.value !== null) {
        rel.field.set(instance, visit.value);
      }
      return;
    }

    ctx.state.markVisited(link.href);
    const value = await traceLinkFetch(SPAN_RELATIONSHIP_RESOLVE, { link: link.href, relationship: rel.name }, () =>
      this.fetchRelationship(link.href, target, resolver, ctx),
    );
    ctx.state.store(link.href, value);
    rel.field.set(instance, value);
  }

  /**
   * @throws RelationshipFetchError when the link cannot be turned into a resource or a list
   */
  private async fetchRelationship<T extends object>(
    link: string,
    cls: ResourceClass<T>,
    resolver: LinkResolver,
    ctx: ConversionContext,
  ): Promise<T | PaginatedResourceList<T>> {
    let document: WireDocument;
    try {
      document = parseDocument(await resolver.resolve(link));
    } catch (error) {
      if (error instanceof RelationshipFetchError) {
        throw error;
      }
      throw new RelationshipFetchError({
        code: "RELATIONSHIP_FETCH_FAILED",
        message: `Failed to resolve relationship link ${link}: ${getErrorMessage(error)}`,
        link,
        cause: error,
      });
    }

    if (document.errors !== undefined) {
      const apiErrors = toApiErrors(document.errors);
      throw new RelationshipFetchError({
        code: "RELATIONSHIP_ERROR_DOCUMENT",
        message: formatApiErrors(apiErrors),
        link,
        apiErrors,
      });
    }

    const data = document.data;
    if (Array.isArray(data)) {
      const elements = await this.readResources(document, data, cls, ctx);
      const page = new ResourcePage(elements, toLinks(document.links), document.meta);
      return new PaginatedResourceList(page, this.env.pageLoader(cls), this.env.logger);
    }
    if (data) {
      const [resource] = await this.readResources(document, [data], cls, ctx);
      if (resource) {
        return resource;
      }
    }
    throw new RelationshipFetchError({
      code: "RELATIONSHIP_NO_PRIMARY_DATA",
      message: `Relationship link ${link} returned no primary data`,
      link,
    });
  }

  private async resolveInline(
    instance: object,
    rel: RelationshipDescriptor,
    entry: RelationshipEntry,
    target: ResourceClass,
    scope: DocumentScope,
    ctx: ConversionContext,
  ): Promise<void> {
    const linkage = entry.data;
    if (linkage === undefined) {
      return;
    }
    if (linkage === null) {
      rel.field.set(instance, null);
      return;
    }

    if (isIdentityList(linkage)) {
      const resolved: object[] = [];
      for (const identity of linkage) {
        const resource = await this.resolveIdentity(identity, target, scope, ctx);
        if (resource !== null) {
          resolved.push(resource);
        }
      }
      rel.field.set(instance, resolved);
      return;
    }

    rel.field.set(instance, await this.resolveIdentity(linkage, target, scope, ctx));
  }

  /**
   * Instance for one inline identity: cached, materialized from the
   * document, a stub, or null.
   */
  private async resolveIdentity(
    identity: ResourceIdentity,
    declared: ResourceClass,
    scope: DocumentScope,
    ctx: ConversionContext,
  ): Promise<object | null> {
    const key = identityKey(identity);
    const cached = ctx.cache.get(key);
    if (cached) {
      return cached;
    }

    const node = scope.find(key);
    if (node) {
      const cls = this.env.types.lookup(node.type)?.cls ?? declared;
      return this.materializeInto(node, cls, scope, ctx);
    }

    if (this.env.unresolvedLinkage === "stub") {
      const existing = ctx.stubs.get(key);
      if (existing) {
        return existing;
      }
      const descriptor = this.env.types.lookup(identity.type) ?? requireDescriptor(this.env.types, declared);
      const stub = this.env.materializer.stub(identity.id, descriptor.cls, descriptor);
      ctx.stubs.set(key, stub);
      return stub;
    }
    return null;
  }
}
