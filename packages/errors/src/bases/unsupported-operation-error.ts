import { GraphwireError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { GraphwireErrorOptions } from "../types.js";

type UnsupportedOperationCode = CodesForBase<"UnsupportedOperationError">;

/**
 * Errors raised by operations a collection does not support, such as any
 * mutation of a read-only paginated list.
 */
export class UnsupportedOperationError<
  C extends UnsupportedOperationCode = UnsupportedOperationCode,
> extends GraphwireError {
  readonly _tag = "UnsupportedOperationError" as const;
  override readonly code: C;

  /** Name of the rejected operation */
  readonly operation: string;

  constructor(options: GraphwireErrorOptions<C> & { operation: string }) {
    super(options.message, options.metadata, options.cause);
    this.code = options.code;
    this.operation = options.operation;
  }
}
