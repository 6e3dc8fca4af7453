import { SpanStatusCode, trace } from "@opentelemetry/api";
import { InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { RecordingResolver, encodeDocument, pageDocument, resourceDocument } from "@graphwire/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ATTR_LINK, ATTR_RELATIONSHIP, SPAN_PAGE_FETCH, SPAN_RELATIONSHIP_RESOLVE, traceLinkFetch } from "../telemetry.js";
import { ADA } from "./fixtures/documents.js";
import { Article, Person, createConverter } from "./fixtures/models.js";

describe("tracing", () => {
  let exporter: InMemorySpanExporter;
  let provider: NodeTracerProvider;

  beforeEach(() => {
    exporter = new InMemorySpanExporter();
    provider = new NodeTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
    trace.disable(); // Clear any previous global provider
    provider.register();
  });

  afterEach(async () => {
    trace.disable();
    exporter.reset();
    await provider.shutdown();
  });

  it("should record load failures on the span and rethrow", async () => {
    await expect(
      traceLinkFetch(SPAN_PAGE_FETCH, { link: "/people?page=3" }, async () => {
        throw new Error("load failure");
      }),
    ).rejects.toThrow("load failure");

    const spans = exporter.getFinishedSpans();
    expect(spans).toHaveLength(1);
    expect(spans[0]?.attributes[ATTR_LINK]).toBe("/people?page=3");
    expect(spans[0]?.attributes[ATTR_RELATIONSHIP]).toBeUndefined();
    expect(spans[0]?.status.code).toBe(SpanStatusCode.ERROR);
    expect(spans[0]?.events[0]?.name).toBe("exception");
  });

  it("should return the loaded value", async () => {
    const value = await traceLinkFetch(SPAN_RELATIONSHIP_RESOLVE, { link: "/a", relationship: "author" }, async () => 42);

    expect(value).toBe(42);
    expect(exporter.getFinishedSpans()[0]?.attributes[ATTR_RELATIONSHIP]).toBe("author");
  });

  it("should trace each relationship link fetch", async () => {
    const recorder = new RecordingResolver({ "/people/9": resourceDocument(ADA) });
    const converter = createConverter();
    converter.setGlobalResolver(recorder);
    const document = resourceDocument({
      type: "articles",
      id: "1",
      relationships: {
        author: { links: { related: "/people/9" } },
        reviewer: { links: { related: "/people/9" } },
      },
    });

    await converter.readObject(encodeDocument(document), Article);

    const spans = exporter.getFinishedSpans().filter((span) => span.name === SPAN_RELATIONSHIP_RESOLVE);
    expect(spans).toHaveLength(1);
    expect(spans[0]?.attributes[ATTR_LINK]).toBe("/people/9");
    expect(spans[0]?.attributes[ATTR_RELATIONSHIP]).toBe("author");
    expect(spans[0]?.status.code).toBe(SpanStatusCode.OK);
  });

  it("should trace page fetches", async () => {
    const recorder = new RecordingResolver({ "/people?page=2": pageDocument([{ type: "people", id: "2" }]) });
    const converter = createConverter();
    converter.setTypeResolver(Person, recorder);
    const first = pageDocument([{ type: "people", id: "1" }], { next: "/people?page=2" });

    const people = await converter.readPaginatedCollection(encodeDocument(first), Person);
    expect(await people.toArray()).toHaveLength(2);

    const spans = exporter.getFinishedSpans().filter((span) => span.name === SPAN_PAGE_FETCH);
    expect(spans).toHaveLength(1);
    expect(spans[0]?.attributes[ATTR_LINK]).toBe("/people?page=2");
  });
});
