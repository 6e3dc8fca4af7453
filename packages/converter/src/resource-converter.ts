import { ConfigurationError, type GraphwireError, wrapError } from "@graphwire/errors";
import { ensureCollection, ensureNotError, ensureObject, parseDocument, toLinks } from "./document/parse.js";
import { type ConverterLogger, DEFAULT_LOG_TAG, createConsoleLogger } from "./logger.js";
import { ResourceMaterializer } from "./materializer.js";
import { createNamingStrategy } from "./naming.js";
import { PaginatedResourceList } from "./pagination/paginated-resource-list.js";
import { type PageLoader, ResourcePage } from "./pagination/resource-page.js";
import { TypeRegistry, requireDescriptor } from "./registry/type-registry.js";
import type { ResourceRegistration } from "./registry/types.js";
import { ConversionContext } from "./resolution/conversion-context.js";
import { RelationshipResolver } from "./resolution/relationship-resolver.js";
import {
  type CollectionResourceDocument,
  ResourceSerializer,
  type SerializeOptions,
  type SingleResourceDocument,
  encodeJson,
} from "./serializer.js";
import type { LinkResolver, Links, Meta, ResourceClass, UnresolvedLinkage, WireInput } from "./types.js";
import { type ConverterOptions, ConverterOptionsSchema, validateOptions } from "./validation.js";

/**
 * One resource together with its document's top-level meta and links.
 */
export interface ReadDocumentResult<T> {
  readonly data: T;
  readonly meta: Meta | undefined;
  readonly links: Links | undefined;
}

export type SafeReadResult<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: GraphwireError };

/**
 * Entry point: reads resource documents into linked object graphs and
 * writes objects back.
 *
 * Classes are registered up front; the first conversion seals the
 * registry. Every read call owns a fresh resolution cache and resolver
 * state, shared by everything it fetches through relationship links.
 *
 * @example
 * const converter = new ResourceConverter();
 * converter.register(Article, { type: "articles", fields: { id: id() } });
 * const article = await converter.readObject(bytes, Article);
 */
export class ResourceConverter {
  readonly registry: TypeRegistry;
  private readonly logger: ConverterLogger;
  private readonly unresolvedLinkage: UnresolvedLinkage;
  private readonly materializer: ResourceMaterializer;
  private readonly resolver: RelationshipResolver;
  private readonly serializer: ResourceSerializer;
  private readonly typedResolvers = new Map<ResourceClass, LinkResolver>();
  private globalResolver: LinkResolver | undefined;

  /**
   * @throws ConfigurationError (CONFIG_INVALID_OPTIONS)
   */
  constructor(options: ConverterOptions = {}) {
    const parsed = validateOptions(ConverterOptionsSchema, options, "converter options");
    const naming = createNamingStrategy(parsed.attributeNaming ?? "identity");

    this.registry = parsed.registry ?? new TypeRegistry();
    this.logger = parsed.logger ?? createConsoleLogger(DEFAULT_LOG_TAG);
    this.unresolvedLinkage = parsed.unresolvedLinkage ?? "null";
    this.materializer = new ResourceMaterializer(naming);
    this.serializer = new ResourceSerializer(this.registry, naming);
    this.resolver = new RelationshipResolver({
      types: this.registry,
      materializer: this.materializer,
      logger: this.logger,
      unresolvedLinkage: this.unresolvedLinkage,
      resolverFor: (cls) => this.resolverFor(cls),
      pageLoader: <T extends object>(cls: ResourceClass<T>): PageLoader<T> => this.pageLoader(cls),
    });
  }

  register<T extends object>(cls: ResourceClass<T>, registration: ResourceRegistration<T>): this {
    this.registry.register(cls, registration);
    return this;
  }

  isRegisteredType(cls: ResourceClass): boolean {
    return this.registry.has(cls);
  }

  /**
   * Resolver used for every class without a typed resolver. Pass undefined
   * to remove it.
   */
  setGlobalResolver(resolver: LinkResolver | undefined): void {
    this.globalResolver = resolver;
  }

  /**
   * @throws ConfigurationError (CONFIG_UNREGISTERED_TYPE)
   */
  setTypeResolver(cls: ResourceClass, resolver: LinkResolver | undefined): void {
    requireDescriptor(this.registry, cls);
    if (resolver) {
      this.typedResolvers.set(cls, resolver);
    } else {
      this.typedResolvers.delete(cls);
    }
  }

  resolverFor(cls: ResourceClass): LinkResolver | undefined {
    return this.typedResolvers.get(cls) ?? this.globalResolver;
  }

  /**
   * Read a document whose primary data is one resource.
   *
   * The resource's own meta goes to its meta field; the document's
   * top-level meta is used only when the resource has none.
   */
  async readObject<T extends object>(input: WireInput, cls: ResourceClass<T>): Promise<T> {
    return (await this.readDocument(input, cls)).data;
  }

  async readDocument<T extends object>(input: WireInput, cls: ResourceClass<T>): Promise<ReadDocumentResult<T>> {
    this.seal();
    const descriptor = requireDescriptor(this.registry, cls);
    const document = parseDocument(input);
    ensureNotError(document);
    const data = ensureObject(document);

    const [resource] = await this.resolver.readResources(document, [data], cls, new ConversionContext());
    if (data.meta === undefined && document.meta !== undefined) {
      this.materializer.bindMeta(resource, document.meta, descriptor);
    }
    return { data: resource, meta: document.meta, links: toLinks(document.links) };
  }

  /**
   * Read a collection document into its first page.
   */
  async readObjectCollection<T extends object>(input: WireInput, cls: ResourceClass<T>): Promise<ResourcePage<T>> {
    this.seal();
    requireDescriptor(this.registry, cls);
    const document = parseDocument(input);
    ensureNotError(document);
    const data = ensureCollection(document);

    const elements = await this.resolver.readResources(document, data, cls, new ConversionContext());
    return new ResourcePage(elements, toLinks(document.links), document.meta);
  }

  /**
   * Read a collection document into a list that fetches further pages
   * through the class's link resolver while it is iterated.
   */
  async readPaginatedCollection<T extends object>(
    input: WireInput,
    cls: ResourceClass<T>,
  ): Promise<PaginatedResourceList<T>> {
    const firstPage = await this.readObjectCollection(input, cls);
    return new PaginatedResourceList(firstPage, this.pageLoader(cls), this.logger);
  }

  /**
   * {@link readObject} returning a result object instead of throwing.
   */
  async safeReadObject<T extends object>(input: WireInput, cls: ResourceClass<T>): Promise<SafeReadResult<T>> {
    try {
      return { success: true, data: await this.readObject(input, cls) };
    } catch (error) {
      return { success: false, error: wrapError(error) };
    }
  }

  toDocument(resource: object, options?: SerializeOptions): SingleResourceDocument {
    this.seal();
    return this.serializer.toDocument(resource, options);
  }

  toCollectionDocument(resources: readonly object[], options?: SerializeOptions): CollectionResourceDocument {
    this.seal();
    return this.serializer.toCollectionDocument(resources, options);
  }

  writeObject(resource: object, options?: SerializeOptions): Uint8Array {
    return encodeJson(this.toDocument(resource, options));
  }

  writeObjectCollection(resources: readonly object[], options?: SerializeOptions): Uint8Array {
    return encodeJson(this.toCollectionDocument(resources, options));
  }

  private pageLoader<T extends object>(cls: ResourceClass<T>): PageLoader<T> {
    return async (link) => {
      const resolver = this.resolverFor(cls);
      if (!resolver) {
        throw new ConfigurationError({
          code: "CONFIG_NO_LINK_RESOLVER",
          message: `No link resolver for '${cls.name}' to fetch ${link}`,
          typeName: cls.name,
        });
      }
      return this.readObjectCollection(await resolver.resolve(link), cls);
    };
  }

  private seal(): void {
    if (this.registry.isSealed) {
      return;
    }
    this.registry.seal();
    this.logger.debug("Type registry sealed", { types: this.registry.typeNames().length });
  }
}
