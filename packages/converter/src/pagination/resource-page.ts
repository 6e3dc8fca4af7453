import type { Links, Meta } from "../types.js";

/**
 * Fetches and converts the page addressed by a `next` link.
 */
export type PageLoader<T> = (link: string) => Promise<ResourcePage<T>>;

/**
 * One page of a collection response.
 */
export class ResourcePage<T> {
  readonly elements: readonly T[];
  /** Pagination links (`first`, `last`, `next`, `prev`) */
  readonly links: Links | undefined;
  readonly meta: Meta | undefined;

  constructor(elements: readonly T[], links?: Links, meta?: Meta) {
    this.elements = elements;
    this.links = links;
    this.meta = meta;
  }

  get nextLink(): string | undefined {
    return this.links?.["next"]?.href;
  }

  get hasNext(): boolean {
    return this.nextLink !== undefined;
  }

  /**
   * Integer value of a meta member, or undefined when absent or not an
   * integer.
   */
  integerMeta(key: string): number | undefined {
    const value = this.meta?.[key];
    return typeof value === "number" && Number.isInteger(value) ? value : undefined;
  }
}
