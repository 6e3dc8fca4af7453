import { GraphwireError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { GraphwireErrorOptions, ValidationIssue } from "../types.js";

type MaterializationCode = CodesForBase<"MaterializationError">;

/**
 * Errors raised while turning one resource object into a typed instance.
 */
export class MaterializationError<
  C extends MaterializationCode = MaterializationCode,
> extends GraphwireError {
  readonly _tag = "MaterializationError" as const;
  override readonly code: C;

  /** Wire type of the resource being materialized */
  readonly resourceType: string;

  readonly issues: readonly ValidationIssue[];

  constructor(
    options: GraphwireErrorOptions<C> & {
      resourceType: string;
      issues?: readonly ValidationIssue[];
    },
  ) {
    super(options.message, options.metadata, options.cause);
    this.code = options.code;
    this.resourceType = options.resourceType;
    this.issues = options.issues ?? [];
  }
}
