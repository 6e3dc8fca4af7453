import { GraphwireError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { ApiErrorObject, GraphwireErrorOptions, ValidationIssue } from "../types.js";

type MalformedDocumentCode = CodesForBase<"MalformedDocumentError">;

/**
 * Errors caused by a document that violates the resource document envelope.
 * The conversion aborts as soon as one is raised.
 */
export class MalformedDocumentError<
  C extends MalformedDocumentCode = MalformedDocumentCode,
> extends GraphwireError {
  readonly _tag = "MalformedDocumentError" as const;
  override readonly code: C;

  /** Schema issues (populated for DOCUMENT_MALFORMED) */
  readonly issues: readonly ValidationIssue[];

  /** Wire error objects (populated for DOCUMENT_HAS_ERRORS) */
  readonly apiErrors: readonly ApiErrorObject[];

  constructor(
    options: GraphwireErrorOptions<C> & {
      issues?: readonly ValidationIssue[];
      apiErrors?: readonly ApiErrorObject[];
    },
  ) {
    super(options.message, options.metadata, options.cause);
    this.code = options.code;
    this.issues = options.issues ?? [];
    this.apiErrors = options.apiErrors ?? [];
  }
}
