/**
 * Core public types shared by the converter, the resolver and the
 * paginated collection.
 */

/**
 * A class the converter can instantiate. Resource classes must be
 * constructible without arguments; attributes are bound after construction.
 */
export type ResourceClass<T extends object = object> = new () => T;

/**
 * Raw bytes or text of one wire document.
 */
export type WireInput = Uint8Array | string;

/**
 * Capability for dereferencing a link string.
 *
 * Implementations may talk to the network, a database or an in-memory map;
 * failures are surfaced by the converter as `RelationshipFetchError`.
 */
export interface LinkResolver {
  resolve(link: string): Promise<WireInput>;
}

/**
 * Free-form meta object.
 */
export type Meta = Readonly<Record<string, unknown>>;

/**
 * A normalized link: both the string form and the `{ href, meta }` form map
 * to this shape.
 */
export interface Link {
  readonly href: string;
  readonly meta?: Meta | undefined;
}

/**
 * Links bag keyed by relation name (`self`, `related`, `next`, ...).
 */
export type Links = Readonly<Record<string, Link>>;

/**
 * How a resolvable relationship is populated from its link.
 *
 * - `object`: fetch the link and materialize the target
 * - `reference`: store the link href itself, never fetch
 */
export type ResolutionStrategy = "object" | "reference";

/**
 * Wire attribute key style. Resource fields are always camelCase.
 */
export type AttributeNaming = "identity" | "camelCase" | "kebab-case" | "snake_case";

/**
 * What to put in a relationship field whose inline identity matches neither
 * a cached object nor a node of the document.
 */
export type UnresolvedLinkage = "null" | "stub";

/**
 * Sentinel returned by size queries when the size cannot be known without
 * fetching every page.
 */
export const UNKNOWN_SIZE = -1;
