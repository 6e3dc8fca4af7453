import { UNKNOWN_SIZE } from "../types.js";

type Pull<T> = () => Promise<IteratorResult<T, undefined>>;

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Lazy, pull-based, single-pass sequence of resources.
 *
 * A sized stream knows how many elements remain; `filter` gives up that
 * knowledge, `skip`, `limit` and `map` keep it.
 */
export class ResourceStream<T> implements AsyncIterable<T> {
  private readonly pull: Pull<T>;
  private readonly remaining: () => number;

  /**
   * @param pull - Produces the next element, or done
   * @param remaining - Elements left, or UNKNOWN_SIZE
   */
  constructor(pull: Pull<T>, remaining: () => number = () => UNKNOWN_SIZE) {
    this.pull = pull;
    this.remaining = remaining;
  }

  static fromIterator<T>(iterator: AsyncIterator<T>, remaining?: () => number): ResourceStream<T> {
    return new ResourceStream<T>(async () => {
      const result = await iterator.next();
      return result.done ? DONE : { done: false, value: result.value };
    }, remaining);
  }

  static of<T>(elements: readonly T[]): ResourceStream<T> {
    let position = 0;
    return new ResourceStream<T>(
      async () => (position < elements.length ? { done: false, value: elements[position++] } : DONE),
      () => elements.length - position,
    );
  }

  isSized(): boolean {
    return this.remaining() !== UNKNOWN_SIZE;
  }

  /**
   * Elements left when sized, UNKNOWN_SIZE otherwise.
   */
  estimateSize(): number {
    const remaining = this.remaining();
    return remaining === UNKNOWN_SIZE ? UNKNOWN_SIZE : Math.max(0, remaining);
  }

  skip(count: number): ResourceStream<T> {
    let toSkip = Math.max(0, count);
    return new ResourceStream<T>(
      async () => {
        while (toSkip > 0) {
          const skipped = await this.pull();
          if (skipped.done) {
            toSkip = 0;
            return DONE;
          }
          toSkip -= 1;
        }
        return this.pull();
      },
      () => {
        const remaining = this.estimateSize();
        return remaining === UNKNOWN_SIZE ? UNKNOWN_SIZE : Math.max(0, remaining - toSkip);
      },
    );
  }

  limit(maxSize: number): ResourceStream<T> {
    let left = Math.max(0, maxSize);
    return new ResourceStream<T>(
      async () => {
        if (left === 0) {
          return DONE;
        }
        const result = await this.pull();
        left = result.done ? 0 : left - 1;
        return result;
      },
      () => {
        const remaining = this.estimateSize();
        return remaining === UNKNOWN_SIZE ? UNKNOWN_SIZE : Math.min(remaining, left);
      },
    );
  }

  filter(predicate: (element: T) => boolean | Promise<boolean>): ResourceStream<T> {
    return new ResourceStream<T>(async () => {
      for (;;) {
        const result = await this.pull();
        if (result.done || (await predicate(result.value))) {
          return result;
        }
      }
    });
  }

  map<U>(mapper: (element: T) => U | Promise<U>): ResourceStream<U> {
    return new ResourceStream<U>(
      async () => {
        const result = await this.pull();
        return result.done ? DONE : { done: false, value: await mapper(result.value) };
      },
      () => this.estimateSize(),
    );
  }

  async findFirst(predicate?: (element: T) => boolean | Promise<boolean>): Promise<T | undefined> {
    for (;;) {
      const result = await this.pull();
      if (result.done) {
        return undefined;
      }
      if (!predicate || (await predicate(result.value))) {
        return result.value;
      }
    }
  }

  async count(): Promise<number> {
    let count = 0;
    while (!(await this.pull()).done) {
      count += 1;
    }
    return count;
  }

  async toArray(): Promise<T[]> {
    const elements: T[] = [];
    for (;;) {
      const result = await this.pull();
      if (result.done) {
        return elements;
      }
      elements.push(result.value);
    }
  }

  async forEach(action: (element: T) => void | Promise<void>): Promise<void> {
    for (;;) {
      const result = await this.pull();
      if (result.done) {
        return;
      }
      await action(result.value);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.pull() };
  }
}
