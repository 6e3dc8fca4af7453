import { MalformedDocumentError } from "@graphwire/errors";
import { describe, expect, it } from "vitest";
import { formatApiErrors, parseDocument, toLinks } from "../document/parse.js";
import { ResourceNode } from "../document/resource-node.js";
import { DocumentScope } from "../document/scope.js";

describe("parseDocument", () => {
  it("should decode bytes and strings alike", () => {
    const text = '{"data":{"type":"people","id":1}}';
    expect(parseDocument(new TextEncoder().encode(text))).toEqual(parseDocument(text));
  });

  it("should fail with DOCUMENT_INVALID_JSON", () => {
    expect(() => parseDocument("{data")).toThrow(MalformedDocumentError);
  });

  it("should accept identifier-only resource objects in data", () => {
    expect(parseDocument('{"data":{"type":"people","id":"1"}}').data).toEqual({ type: "people", id: "1" });
  });
});

describe("formatApiErrors", () => {
  it("should render one line per error and skip missing parts", () => {
    expect(
      formatApiErrors([
        { title: "Invalid", code: "E1", detail: "name is required" },
        { detail: "only detail" },
        { code: "E3" },
      ]),
    ).toBe("Invalid: Error code: E1 Detail: name is required\nDetail: only detail\nError code: E3");
  });
});

describe("toLinks", () => {
  it("should normalize both link forms and drop null links", () => {
    expect(toLinks({ self: "/a", related: { href: "/b" }, next: null })).toEqual({
      self: { href: "/a" },
      related: { href: "/b" },
    });
    expect(toLinks(undefined)).toBeUndefined();
  });
});

describe("ResourceNode", () => {
  it("should coerce ids and keep relationship linkage shapes", () => {
    const node = new ResourceNode({
      type: "articles",
      id: 7,
      relationships: {
        author: { data: { type: "people", id: 9 } },
        tags: { data: [{ type: "tags", id: "t1" }] },
        editor: { data: null },
        comments: { links: { related: "/articles/7/comments" } },
      },
    });

    expect(node.id).toBe("7");
    expect(node.key).toBe("articles:7");
    expect(node.relationships.get("author")?.data).toEqual({ type: "people", id: "9" });
    expect(node.relationships.get("tags")?.data).toEqual([{ type: "tags", id: "t1" }]);
    expect(node.relationships.get("editor")?.data).toBeNull();
    expect(node.relationships.get("comments")?.data).toBeUndefined();
    expect(node.relationships.get("comments")?.links).toEqual({ related: { href: "/articles/7/comments" } });
    expect([...node.relationships.keys()]).toEqual(["author", "tags", "editor", "comments"]);
  });
});

describe("DocumentScope", () => {
  it("should find primary and included nodes with primary winning", () => {
    const scope = new DocumentScope(
      [{ type: "people", id: "1", attributes: { name: "primary" } }],
      [
        { type: "people", id: "1", attributes: { name: "included" } },
        { type: "people", id: "2" },
      ],
    );

    expect(scope.find("people:1")?.attributes).toEqual({ name: "primary" });
    expect(scope.find("people:2")?.id).toBe("2");
    expect(scope.find("people:3")).toBeUndefined();
  });
});
