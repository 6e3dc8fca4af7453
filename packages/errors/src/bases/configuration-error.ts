import { GraphwireError } from "../base.js";
import type { CodesForBase } from "../catalog.js";
import type { GraphwireErrorOptions } from "../types.js";

type ConfigurationCode = CodesForBase<"ConfigurationError">;

/**
 * Errors caused by a bad type registration or invalid options.
 * Raised eagerly, before any document is read. The `.code` field
 * discriminates the specific error.
 */
export class ConfigurationError<
  C extends ConfigurationCode = ConfigurationCode,
> extends GraphwireError {
  readonly _tag = "ConfigurationError" as const;
  override readonly code: C;

  /** Resource class or type name the problem was found on, when known */
  readonly typeName: string | undefined;

  constructor(options: GraphwireErrorOptions<C> & { typeName?: string | undefined }) {
    super(options.message, options.metadata, options.cause);
    this.code = options.code;
    this.typeName = options.typeName;
  }
}
