import { CollectionAccessError, UnsupportedOperationError } from "@graphwire/errors";
import type { ConverterLogger } from "../logger.js";
import { UNKNOWN_SIZE } from "../types.js";
import { PagingIterator } from "./paging-iterator.js";
import type { PageLoader, ResourcePage } from "./resource-page.js";
import { ResourceStream } from "./resource-stream.js";

export type Equality<T> = (a: T, b: T) => boolean;

function readOnly(operation: string): never {
  throw new UnsupportedOperationError({
    code: "COLLECTION_READ_ONLY",
    message: `${operation} is not supported: paginated resource lists are read-only`,
    operation,
  });
}

function unsupported(operation: string): never {
  throw new UnsupportedOperationError({
    code: "COLLECTION_UNSUPPORTED",
    message: `${operation} is not supported: collect the list with toArray() first`,
    operation,
  });
}

function outOfBounds(index: number, size: number): CollectionAccessError {
  return new CollectionAccessError({
    code: "COLLECTION_INDEX_OUT_OF_BOUNDS",
    message: size === UNKNOWN_SIZE ? `Index ${index} is out of bounds` : `Index ${index} is out of bounds for size ${size}`,
    index,
  });
}

/**
 * Read-only list over every page reachable from a first page through `next`
 * links. Further pages are fetched only while iterating, and every scan
 * starts a fresh pass from the first page.
 *
 * Size is known only when the server says so: see {@link total}.
 */
export class PaginatedResourceList<T> implements AsyncIterable<T> {
  readonly firstPage: ResourcePage<T>;
  private readonly loader: PageLoader<T>;
  private readonly logger: ConverterLogger;

  constructor(firstPage: ResourcePage<T>, loader: PageLoader<T>, logger: ConverterLogger) {
    this.firstPage = firstPage;
    this.loader = loader;
    this.logger = logger;
  }

  /**
   * With a `next` link: the integer `meta.total`, or UNKNOWN_SIZE.
   * Without one: the element count of the first page, whatever meta says.
   */
  total(): number {
    if (!this.firstPage.hasNext) {
      return this.firstPage.elements.length;
    }
    return this.firstPage.integerMeta("total") ?? UNKNOWN_SIZE;
  }

  /**
   * Integer `meta.per_page`, or UNKNOWN_SIZE.
   */
  perPage(): number {
    return this.firstPage.integerMeta("per_page") ?? UNKNOWN_SIZE;
  }

  size(): number {
    return this.total();
  }

  isSized(): boolean {
    return this.total() !== UNKNOWN_SIZE;
  }

  isEmpty(): boolean {
    return this.firstPage.elements.length === 0;
  }

  iterator(): PagingIterator<T> {
    return new PagingIterator(this.firstPage, this.loader, this.logger);
  }

  [Symbol.asyncIterator](): PagingIterator<T> {
    return this.iterator();
  }

  stream(): ResourceStream<T> {
    const iterator = this.iterator();
    const total = this.total();
    if (total === UNKNOWN_SIZE) {
      return ResourceStream.fromIterator(iterator);
    }
    return ResourceStream.fromIterator(iterator, () =>
      iterator.isExhausted ? 0 : Math.max(0, total - iterator.consumed),
    );
  }

  async forEach(action: (element: T, index: number) => void | Promise<void>): Promise<void> {
    let index = 0;
    for await (const element of this) {
      await action(element, index);
      index += 1;
    }
  }

  toArray(): Promise<T[]> {
    return this.stream().toArray();
  }

  /**
   * @throws CollectionAccessError for a negative index, a non-integer one, or one past the end
   */
  async get(index: number): Promise<T> {
    if (!Number.isInteger(index)) {
      throw outOfBounds(index, this.size());
    }
    if (index < 0) {
      throw new CollectionAccessError({
        code: "COLLECTION_NEGATIVE_INDEX",
        message: `Index must not be negative: ${index}`,
        index,
      });
    }
    const size = this.size();
    if (size !== UNKNOWN_SIZE && index >= size) {
      throw outOfBounds(index, size);
    }

    let position = 0;
    for await (const element of this) {
      if (position === index) {
        return element;
      }
      position += 1;
    }
    throw outOfBounds(index, size);
  }

  async contains(value: T, equals: Equality<T> = Object.is): Promise<boolean> {
    return (await this.indexOf(value, equals)) !== -1;
  }

  async indexOf(value: T, equals: Equality<T> = Object.is): Promise<number> {
    if (this.size() === 0) {
      return -1;
    }
    let position = 0;
    for await (const element of this) {
      if (equals(element, value)) {
        return position;
      }
      position += 1;
    }
    return -1;
  }

  async lastIndexOf(value: T, equals: Equality<T> = Object.is): Promise<number> {
    let found = -1;
    let position = 0;
    for await (const element of this) {
      if (equals(element, value)) {
        found = position;
      }
      position += 1;
    }
    return found;
  }

  /**
   * Elements in `[fromIndex, toIndex)`.
   *
   * @throws CollectionAccessError when the range does not fit the list
   */
  async subList(fromIndex: number, toIndex: number): Promise<T[]> {
    for (const index of [fromIndex, toIndex]) {
      if (!Number.isInteger(index)) {
        throw outOfBounds(index, this.size());
      }
    }
    if (fromIndex < 0) {
      throw new CollectionAccessError({
        code: "COLLECTION_NEGATIVE_INDEX",
        message: `fromIndex must not be negative: ${fromIndex}`,
        index: fromIndex,
      });
    }
    const size = this.size();
    if (fromIndex > toIndex || (size !== UNKNOWN_SIZE && size < toIndex)) {
      throw new CollectionAccessError({
        code: "COLLECTION_INVALID_RANGE",
        message: `Invalid range [${fromIndex}, ${toIndex})`,
        index: toIndex,
      });
    }

    const slice = await this.stream().skip(fromIndex).limit(toIndex - fromIndex).toArray();
    if (slice.length < toIndex - fromIndex) {
      throw new CollectionAccessError({
        code: "COLLECTION_INVALID_RANGE",
        message: `Invalid range [${fromIndex}, ${toIndex}): the list ended after ${fromIndex + slice.length} elements`,
        index: toIndex,
      });
    }
    return slice;
  }

  add(_element: T): never {
    return readOnly("add");
  }

  addAll(_elements: Iterable<T>): never {
    return readOnly("addAll");
  }

  set(_index: number, _element: T): never {
    return readOnly("set");
  }

  remove(_element: T): never {
    return readOnly("remove");
  }

  removeAll(_elements: Iterable<T>): never {
    return readOnly("removeAll");
  }

  retainAll(_elements: Iterable<T>): never {
    return readOnly("retainAll");
  }

  removeIf(_predicate: (element: T) => boolean): never {
    return readOnly("removeIf");
  }

  clear(): never {
    return readOnly("clear");
  }

  replaceAll(_operator: (element: T) => T): never {
    return readOnly("replaceAll");
  }

  sort(_compare?: (a: T, b: T) => number): never {
    return readOnly("sort");
  }

  listIterator(_index?: number): never {
    return unsupported("listIterator");
  }

  containsAll(_elements: Iterable<T>): never {
    return unsupported("containsAll");
  }
}
