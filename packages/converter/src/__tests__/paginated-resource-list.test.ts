import { CollectionAccessError, UnsupportedOperationError } from "@graphwire/errors";
import { RecordingResolver, encodeDocument, pageDocument } from "@graphwire/test-utils";
import { describe, expect, it, vi } from "vitest";
import { silentLogger } from "../logger.js";
import { PaginatedResourceList } from "../pagination/paginated-resource-list.js";
import { type PageLoader, ResourcePage } from "../pagination/resource-page.js";
import { UNKNOWN_SIZE } from "../types.js";
import { Person, createConverter } from "./fixtures/models.js";

function page(elements: readonly string[], next?: string, meta?: Record<string, unknown>): ResourcePage<string> {
  return new ResourcePage(elements, next === undefined ? undefined : { next: { href: next } }, meta);
}

/**
 * Loader serving pages keyed by link; unknown links reject.
 */
function pagesLoader(pages: Record<string, ResourcePage<string>>): PageLoader<string> {
  return vi.fn(async (link: string) => {
    const found = pages[link];
    if (!found) {
      throw new Error(`no page at ${link}`);
    }
    return found;
  });
}

function threePageList(): { list: PaginatedResourceList<string>; loader: PageLoader<string> } {
  const loader = pagesLoader({
    "/p2": page(["b"], "/p3"),
    "/p3": page(["c"]),
  });
  return { list: new PaginatedResourceList(page(["a"], "/p2"), loader, silentLogger), loader };
}

async function caught(action: () => Promise<unknown>): Promise<unknown> {
  try {
    await action();
  } catch (error) {
    return error;
  }
  throw new Error("expected the action to throw");
}

describe("PaginatedResourceList size", () => {
  it("should ignore meta.total when there is no next link", () => {
    const list = new PaginatedResourceList(page(["a", "b"], undefined, { total: 1000 }), pagesLoader({}), silentLogger);
    expect(list.total()).toBe(2);
    expect(list.size()).toBe(2);
    expect(list.isSized()).toBe(true);
  });

  it("should trust meta.total when there is a next link", () => {
    const list = new PaginatedResourceList(page(["a", "b"], "/p2", { total: 1000 }), pagesLoader({}), silentLogger);
    expect(list.total()).toBe(1000);
  });

  it("should report unknown total and per-page without meta, yet stream every page", async () => {
    const { list } = threePageList();

    expect(list.total()).toBe(UNKNOWN_SIZE);
    expect(list.perPage()).toBe(UNKNOWN_SIZE);
    expect(list.isSized()).toBe(false);

    const stream = list.stream();
    expect(stream.isSized()).toBe(false);
    expect(await stream.toArray()).toEqual(["a", "b", "c"]);
  });

  it("should read per_page from meta and never infer it", () => {
    const withMeta = new PaginatedResourceList(page(["a"], "/p2", { per_page: 25 }), pagesLoader({}), silentLogger);
    const withoutMeta = new PaginatedResourceList(page(["a"]), pagesLoader({}), silentLogger);
    expect(withMeta.perPage()).toBe(25);
    expect(withoutMeta.perPage()).toBe(UNKNOWN_SIZE);
  });

  it("should treat a non-integer total as unknown", () => {
    const list = new PaginatedResourceList(page(["a"], "/p2", { total: "many" }), pagesLoader({}), silentLogger);
    expect(list.total()).toBe(UNKNOWN_SIZE);
  });

  it("should report emptiness from the first page", () => {
    expect(new PaginatedResourceList(page([]), pagesLoader({}), silentLogger).isEmpty()).toBe(true);
    expect(threePageList().list.isEmpty()).toBe(false);
  });
});

describe("PaginatedResourceList access", () => {
  it("should walk the pages for get", async () => {
    const { list } = threePageList();
    expect(await list.get(0)).toBe("a");
    expect(await list.get(2)).toBe("c");
  });

  it("should reject a negative index", async () => {
    const { list, loader } = threePageList();
    const error = await caught(() => list.get(-1));
    expect(error).toBeInstanceOf(CollectionAccessError);
    expect(error).toMatchObject({ code: "COLLECTION_NEGATIVE_INDEX", index: -1 });
    expect(loader).not.toHaveBeenCalled();
  });

  it("should reject an index past a known size without fetching", async () => {
    const loader = pagesLoader({ "/p2": page(["c", "d"]) });
    const list = new PaginatedResourceList(page(["a", "b"], "/p2", { total: 4 }), loader, silentLogger);

    const error = await caught(() => list.get(4));
    expect(error).toMatchObject({ code: "COLLECTION_INDEX_OUT_OF_BOUNDS", index: 4 });
    expect(loader).not.toHaveBeenCalled();
  });

  it("should reject an index past the end of an unknown-size list after walking it", async () => {
    const { list, loader } = threePageList();
    const error = await caught(() => list.get(3));
    expect(error).toMatchObject({ code: "COLLECTION_INDEX_OUT_OF_BOUNDS", index: 3 });
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("should reject NaN and fractional indexes without fetching", async () => {
    const { list, loader } = threePageList();

    for (const index of [Number.NaN, 1.5, Number.POSITIVE_INFINITY]) {
      const error = await caught(() => list.get(index));
      expect(error).toMatchObject({ code: "COLLECTION_INDEX_OUT_OF_BOUNDS" });
    }
    await expect(list.subList(0, 1.5)).rejects.toMatchObject({ code: "COLLECTION_INDEX_OUT_OF_BOUNDS", index: 1.5 });
    await expect(list.subList(Number.NaN, 2)).rejects.toMatchObject({ code: "COLLECTION_INDEX_OUT_OF_BOUNDS" });
    expect(loader).not.toHaveBeenCalled();
  });

  it("should scan for contains, indexOf and lastIndexOf", async () => {
    const loader = pagesLoader({ "/p2": page(["b", "a"]) });
    const list = new PaginatedResourceList(page(["a", "b"], "/p2"), loader, silentLogger);

    expect(await list.contains("b")).toBe(true);
    expect(await list.contains("z")).toBe(false);
    expect(await list.indexOf("b")).toBe(1);
    expect(await list.lastIndexOf("a")).toBe(3);
    expect(await list.lastIndexOf("z")).toBe(-1);
  });

  it("should accept a custom equality", async () => {
    const { list } = threePageList();
    const sameLetter = (x: string, y: string): boolean => x.toLowerCase() === y.toLowerCase();
    expect(await list.indexOf("C", sameLetter)).toBe(2);
  });

  it("should find elements on later pages of an unknown-size list", async () => {
    const { list } = threePageList();
    expect(await list.indexOf("c")).toBe(2);
  });

  it("should return -1 from indexOf on an empty list without fetching", async () => {
    const loader = pagesLoader({});
    const list = new PaginatedResourceList(page([]), loader, silentLogger);
    expect(await list.indexOf("a")).toBe(-1);
    expect(loader).not.toHaveBeenCalled();
  });

  it("should slice across pages with subList", async () => {
    const { list } = threePageList();
    expect(await list.subList(1, 3)).toEqual(["b", "c"]);
    expect(await list.subList(1, 1)).toEqual([]);
  });

  it("should reject invalid subList ranges", async () => {
    const { list } = threePageList();
    expect(await caught(() => list.subList(-1, 2))).toMatchObject({ code: "COLLECTION_NEGATIVE_INDEX" });
    expect(await caught(() => list.subList(2, 1))).toMatchObject({ code: "COLLECTION_INVALID_RANGE" });
    expect(await caught(() => list.subList(0, 4))).toMatchObject({ code: "COLLECTION_INVALID_RANGE" });

    const sized = new PaginatedResourceList(page(["a", "b"]), pagesLoader({}), silentLogger);
    expect(await caught(() => sized.subList(0, 3))).toMatchObject({ code: "COLLECTION_INVALID_RANGE" });
  });

  it("should pass index and element to forEach", async () => {
    const { list } = threePageList();
    const seen: string[] = [];
    await list.forEach((element, index) => {
      seen.push(`${index}:${element}`);
    });
    expect(seen).toEqual(["0:a", "1:b", "2:c"]);
  });

  it("should support for await", async () => {
    const { list } = threePageList();
    const seen: string[] = [];
    for await (const element of list) {
      seen.push(element);
    }
    expect(seen).toEqual(["a", "b", "c"]);
  });

  it("should start a fresh pass for every scan", async () => {
    const { list, loader } = threePageList();
    await list.toArray();
    await list.toArray();
    expect(loader).toHaveBeenCalledTimes(4);
  });
});

describe("PaginatedResourceList is read-only", () => {
  const mutators: [string, (list: PaginatedResourceList<string>) => unknown][] = [
    ["add", (list) => list.add("x")],
    ["addAll", (list) => list.addAll(["x"])],
    ["set", (list) => list.set(0, "x")],
    ["remove", (list) => list.remove("a")],
    ["removeAll", (list) => list.removeAll(["a"])],
    ["retainAll", (list) => list.retainAll(["a"])],
    ["removeIf", (list) => list.removeIf(() => true)],
    ["clear", (list) => list.clear()],
    ["replaceAll", (list) => list.replaceAll((element) => element.toUpperCase())],
    ["sort", (list) => list.sort()],
  ];

  it.each(mutators)("should reject %s without side effects", async (operation, mutate) => {
    const { list, loader } = threePageList();

    let thrown: unknown;
    try {
      mutate(list);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(UnsupportedOperationError);
    expect(thrown).toMatchObject({ code: "COLLECTION_READ_ONLY", operation });
    expect(loader).not.toHaveBeenCalled();
    expect(await list.toArray()).toEqual(["a", "b", "c"]);
  });

  it("should reject listIterator and containsAll as unsupported", () => {
    const { list } = threePageList();
    expect(() => list.listIterator()).toThrow(UnsupportedOperationError);
    expect(() => list.containsAll(["a"])).toThrow("containsAll is not supported");
  });
});

describe("readPaginatedCollection", () => {
  it("should follow next links through the converter's resolver", async () => {
    const recorder = new RecordingResolver({
      "/people?page=2": pageDocument([{ type: "people", id: "2", attributes: { name: "Alan" } }], {
        next: "/people?page=3",
      }),
      "/people?page=3": pageDocument([{ type: "people", id: "3", attributes: { name: "Edsger" } }]),
    });
    const converter = createConverter();
    converter.setTypeResolver(Person, recorder);
    const first = pageDocument([{ type: "people", id: "1", attributes: { name: "Grace" } }], {
      next: "/people?page=2",
      meta: { total: 3, per_page: 1 },
    });

    const people = await converter.readPaginatedCollection(encodeDocument(first), Person);
    expect(people.total()).toBe(3);
    expect(people.perPage()).toBe(1);
    expect(recorder.callCount).toBe(0);

    const names = (await people.toArray()).map((person) => person.name);
    expect(names).toEqual(["Grace", "Alan", "Edsger"]);
    expect(recorder.calls).toEqual(["/people?page=2", "/people?page=3"]);
  });

  it("should end iteration after the first page when no resolver is set", async () => {
    const converter = createConverter();
    const first = pageDocument([{ type: "people", id: "1" }], { next: "/people?page=2" });

    const people = await converter.readPaginatedCollection(encodeDocument(first), Person);
    expect(await people.toArray()).toHaveLength(1);
  });
});
