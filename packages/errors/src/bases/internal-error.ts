import { GraphwireError } from "../base.js";

/**
 * Errors with no better classification. {@link wrapError} produces these
 * for foreign values.
 */
export class InternalError extends GraphwireError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;
}
