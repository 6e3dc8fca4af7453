import { ConfigurationError, RelationshipFetchError } from "@graphwire/errors";
import { afterEach, describe, expect, it, vi } from "vitest";
import { FetchLinkResolver, RESOURCE_MEDIA_TYPE } from "../resolvers/fetch-link-resolver.js";

describe("FetchLinkResolver", () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it("should return the response body and send the resource media type", async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('{"data":null}', { status: 200 }));
    globalThis.fetch = fetchMock;

    const resolver = new FetchLinkResolver({ headers: { Authorization: "Bearer test-token" } });
    const body = await resolver.resolve("https://api.example.com/people/9");

    expect(new TextDecoder().decode(body)).toBe('{"data":null}');
    expect(fetchMock).toHaveBeenCalledWith(
      "https://api.example.com/people/9",
      expect.objectContaining({
        headers: { Accept: RESOURCE_MEDIA_TYPE, Authorization: "Bearer test-token" },
      }),
    );
  });

  it("should resolve relative links against the base URL", async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response("{}", { status: 200 }));
    globalThis.fetch = fetchMock;

    await new FetchLinkResolver({ baseUrl: "https://api.example.com/v1/" }).resolve("people/9");

    expect(fetchMock).toHaveBeenCalledWith("https://api.example.com/v1/people/9", expect.anything());
  });

  it("should classify non-2xx responses as RELATIONSHIP_FETCH_FAILED with the status", async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response("gone", { status: 410 }));

    const error = await new FetchLinkResolver().resolve("https://api.example.com/people/9").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RelationshipFetchError);
    expect(error).toMatchObject({
      code: "RELATIONSHIP_FETCH_FAILED",
      link: "https://api.example.com/people/9",
      metadata: { status: "410", url: "https://api.example.com/people/9" },
      message: "HTTP 410 fetching https://api.example.com/people/9: gone",
    });
  });

  it("should classify network failures as RELATIONSHIP_FETCH_FAILED", async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError("fetch failed"));

    await expect(new FetchLinkResolver().resolve("https://api.example.com/people/9")).rejects.toMatchObject({
      code: "RELATIONSHIP_FETCH_FAILED",
      message: "fetch failed",
    });
  });

  it("should time out", async () => {
    globalThis.fetch = vi.fn().mockImplementation(
      (_url: string, init: RequestInit) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => {
            reject(new DOMException("The operation was aborted.", "AbortError"));
          });
        }),
    );

    await expect(
      new FetchLinkResolver({ timeoutMs: 100 }).resolve("https://api.example.com/slow"),
    ).rejects.toMatchObject({
      code: "RELATIONSHIP_FETCH_FAILED",
      message: "Request to https://api.example.com/slow timed out after 100ms",
    });
  });

  it("should reject invalid configuration", () => {
    expect(() => new FetchLinkResolver({ timeoutMs: 5 })).toThrow(ConfigurationError);
    expect(() => new FetchLinkResolver({ baseUrl: "not a url" })).toThrow("Invalid fetch link resolver config");
  });
});
