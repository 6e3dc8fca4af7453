import { GraphwireError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { GraphwireErrorOptions } from "../types.js";

type CollectionAccessCode = CodesForBase<"CollectionAccessError">;

/**
 * Errors raised by positional access into a lazily fetched collection.
 */
export class CollectionAccessError<
  C extends CollectionAccessCode = CollectionAccessCode,
> extends GraphwireError {
  readonly _tag = "CollectionAccessError" as const;
  override readonly code: C;

  /** Offending index, when the error concerns one */
  readonly index: number | undefined;

  constructor(options: GraphwireErrorOptions<C> & { index?: number | undefined }) {
    super(options.message, options.metadata, options.cause);
    this.code = options.code;
    this.index = options.index;
  }
}
