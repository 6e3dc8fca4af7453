import { type BaseErrorType, ERROR_CATALOG, type ErrorCode, type ErrorDomain } from "./catalog.js";

/**
 * JSON shape produced by {@link GraphwireError.toJSON}.
 */
export interface ErrorJSON {
  _tag: BaseErrorType;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string> | undefined;
  cause?: string | undefined;
  stack?: string | undefined;
}

/**
 * Root of the graphwire error hierarchy.
 *
 * Subclasses pin `_tag` to their base type and narrow `code` to the catalog
 * codes of that base type. Domain, expectation and title are read from the
 * catalog entry of the code.
 */
export abstract class GraphwireError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;

  readonly metadata: Record<string, string> | undefined;
  readonly timestamp: Date;

  constructor(message: string, metadata?: Record<string, string>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.metadata = metadata;
    this.timestamp = new Date();
  }

  get domain(): ErrorDomain {
    return ERROR_CATALOG[this.code].domain;
  }

  get isExpected(): boolean {
    return ERROR_CATALOG[this.code].isExpected;
  }

  get title(): string {
    return ERROR_CATALOG[this.code].title;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      stack: this.stack,
    };
  }

  override toString(): string {
    const metadata = this.metadata ? ` ${JSON.stringify(this.metadata)}` : "";
    return `${this.name} [${this.code}]: ${this.message}${metadata}`;
  }
}

/**
 * Check if a value is an Error instance
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Check if a value is a GraphwireError
 */
export function isGraphwireError(value: unknown): value is GraphwireError {
  return value instanceof GraphwireError;
}
