/**
 * Tracing for link dereferencing. Each relationship link and each page link
 * that goes through a LinkResolver is fetched inside one span carrying the
 * link. With no tracer provider registered the spans are no-ops.
 */

import { type Span, SpanStatusCode, trace } from "@opentelemetry/api";

const TRACER_NAME = "graphwire";

export const SPAN_RELATIONSHIP_RESOLVE = "graphwire.relationship.resolve";
export const SPAN_PAGE_FETCH = "graphwire.page.fetch";

export const ATTR_LINK = "graphwire.link";
export const ATTR_RELATIONSHIP = "graphwire.relationship";

export type LinkFetchSpan = typeof SPAN_RELATIONSHIP_RESOLVE | typeof SPAN_PAGE_FETCH;

export interface LinkFetchTarget {
  readonly link: string;
  /** Relationship name, for links taken from a relationship object */
  readonly relationship?: string;
}

function markFailed(span: Span, error: unknown): void {
  if (error instanceof Error) {
    span.recordException(error);
  }
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: error instanceof Error ? error.message : String(error),
  });
}

/**
 * Run `load` inside a span describing the link being fetched. Failures are
 * recorded on the span and rethrown unchanged.
 */
export function traceLinkFetch<T>(
  name: LinkFetchSpan,
  target: LinkFetchTarget,
  load: () => Promise<T>,
): Promise<T> {
  const attributes: Record<string, string> = { [ATTR_LINK]: target.link };
  if (target.relationship !== undefined) {
    attributes[ATTR_RELATIONSHIP] = target.relationship;
  }

  return trace.getTracer(TRACER_NAME).startActiveSpan(name, { attributes }, async (span) => {
    try {
      const value = await load();
      span.setStatus({ code: SpanStatusCode.OK });
      return value;
    } catch (error) {
      markFailed(span, error);
      throw error;
    } finally {
      span.end();
    }
  });
}
