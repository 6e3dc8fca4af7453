/**
 * LinkResolver over the global fetch, with timeout and error classification.
 */

import { RelationshipFetchError } from "@graphwire/errors";
import type { LinkResolver } from "../types.js";
import { type FetchLinkResolverConfig, FetchLinkResolverConfigSchema, validateOptions } from "../validation.js";

export const DEFAULT_TIMEOUT_MS = 10_000;

export const RESOURCE_MEDIA_TYPE = "application/vnd.api+json";

export class FetchLinkResolver implements LinkResolver {
  private readonly baseUrl: string | undefined;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(config: FetchLinkResolverConfig = {}) {
    const parsed = validateOptions(FetchLinkResolverConfigSchema, config, "fetch link resolver config");
    this.baseUrl = parsed.baseUrl;
    this.timeoutMs = parsed.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.headers = { Accept: RESOURCE_MEDIA_TYPE, ...parsed.headers };
  }

  /**
   * @throws RelationshipFetchError (RELATIONSHIP_FETCH_FAILED) on non-2xx, timeout or network failure
   */
  async resolve(link: string): Promise<Uint8Array> {
    const url = this.baseUrl === undefined ? link : new URL(link, this.baseUrl).toString();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, { headers: this.headers, signal: controller.signal });

      if (!response.ok) {
        const body = await response.text().catch(() => "");
        throw new RelationshipFetchError({
          code: "RELATIONSHIP_FETCH_FAILED",
          message: `HTTP ${response.status} fetching ${url}${body ? `: ${body}` : ""}`,
          link,
          metadata: { status: String(response.status), url },
        });
      }

      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      if (error instanceof RelationshipFetchError) {
        throw error;
      }

      if (error instanceof DOMException && error.name === "AbortError") {
        throw new RelationshipFetchError({
          code: "RELATIONSHIP_FETCH_FAILED",
          message: `Request to ${url} timed out after ${this.timeoutMs}ms`,
          link,
          metadata: { url },
          cause: error,
        });
      }

      throw new RelationshipFetchError({
        code: "RELATIONSHIP_FETCH_FAILED",
        message: error instanceof Error ? error.message : String(error),
        link,
        metadata: { url },
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
