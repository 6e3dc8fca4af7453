import { GraphwireError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { ApiErrorObject, GraphwireErrorOptions } from "../types.js";

type RelationshipFetchCode = CodesForBase<"RelationshipFetchError">;

/**
 * Errors raised while dereferencing a relationship link. They abort the
 * enclosing top-level conversion and are never retried automatically.
 */
export class RelationshipFetchError<
  C extends RelationshipFetchCode = RelationshipFetchCode,
> extends GraphwireError {
  readonly _tag = "RelationshipFetchError" as const;
  override readonly code: C;

  /** The relationship link that was being resolved */
  readonly link: string;

  /** Wire error objects (populated for RELATIONSHIP_ERROR_DOCUMENT) */
  readonly apiErrors: readonly ApiErrorObject[];

  constructor(
    options: GraphwireErrorOptions<C> & { link: string; apiErrors?: readonly ApiErrorObject[] },
  ) {
    super(options.message, options.metadata, options.cause);
    this.code = options.code;
    this.link = options.link;
    this.apiErrors = options.apiErrors ?? [];
  }
}
