import { CollectionAccessError } from "@graphwire/errors";
import type { ConverterLogger } from "../logger.js";
import { SPAN_PAGE_FETCH, traceLinkFetch } from "../telemetry.js";
import type { PageLoader, ResourcePage } from "./resource-page.js";

type IteratorState<T> =
  | { readonly kind: "has-page"; readonly page: ResourcePage<T>; position: number }
  | { readonly kind: "fetching"; readonly pending: Promise<AdvanceResult> }
  | { readonly kind: "exhausted" };

/**
 * Outcome of moving to the next page.
 */
export type AdvanceResult =
  | { readonly kind: "advanced" }
  | { readonly kind: "end-of-pages" }
  | { readonly kind: "fetch-failed"; readonly link: string; readonly error: unknown };

/**
 * Single-pass, forward-only iterator over every page reachable through
 * `next` links. Pages are fetched when the current one runs out.
 *
 * A failed page fetch ends iteration: it is logged and never thrown to the
 * caller.
 */
export class PagingIterator<T> implements AsyncIterableIterator<T> {
  private state: IteratorState<T>;
  private readonly loader: PageLoader<T>;
  private readonly logger: ConverterLogger;
  private delivered = 0;

  constructor(firstPage: ResourcePage<T>, loader: PageLoader<T>, logger: ConverterLogger) {
    this.state = { kind: "has-page", page: firstPage, position: 0 };
    this.loader = loader;
    this.logger = logger;
  }

  /** Number of elements handed out so far */
  get consumed(): number {
    return this.delivered;
  }

  get isExhausted(): boolean {
    return this.state.kind === "exhausted";
  }

  async hasNext(): Promise<boolean> {
    for (;;) {
      const state = this.state;
      switch (state.kind) {
        case "has-page": {
          if (state.position < state.page.elements.length) {
            return true;
          }
          const result = await this.advance();
          if (result.kind !== "advanced") {
            return false;
          }
          break;
        }
        case "fetching":
          await state.pending;
          break;
        case "exhausted":
          return false;
      }
    }
  }

  /**
   * @throws CollectionAccessError (COLLECTION_NO_SUCH_ELEMENT) when no element is left
   */
  async nextElement(): Promise<T> {
    const available = await this.hasNext();
    const state = this.state;
    if (!available || state.kind !== "has-page") {
      throw new CollectionAccessError({
        code: "COLLECTION_NO_SUCH_ELEMENT",
        message: "No more elements",
      });
    }
    const element = state.page.elements[state.position];
    state.position += 1;
    this.delivered += 1;
    return element;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    if (!(await this.hasNext())) {
      return { done: true, value: undefined };
    }
    return { done: false, value: await this.nextElement() };
  }

  /**
   * Leave the current page for the one its `next` link points at.
   * Callers arriving while a fetch is in flight share its result.
   */
  advance(): Promise<AdvanceResult> {
    const state = this.state;
    switch (state.kind) {
      case "exhausted":
        return Promise.resolve({ kind: "end-of-pages" });
      case "fetching":
        return state.pending;
      case "has-page": {
        const link = state.page.nextLink;
        if (link === undefined) {
          this.state = { kind: "exhausted" };
          return Promise.resolve({ kind: "end-of-pages" });
        }
        const pending = this.fetch(link);
        this.state = { kind: "fetching", pending };
        return pending;
      }
    }
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  private async fetch(link: string): Promise<AdvanceResult> {
    try {
      const page = await traceLinkFetch(SPAN_PAGE_FETCH, { link }, () => this.loader(link));
      this.state = { kind: "has-page", page, position: 0 };
      return { kind: "advanced" };
    } catch (error) {
      this.logger.warn("Page fetch failed, ending iteration", {
        link,
        error: error instanceof Error ? error.message : String(error),
      });
      this.state = { kind: "exhausted" };
      return { kind: "fetch-failed", link, error };
    }
  }
}
