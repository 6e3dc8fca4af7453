/**
 * Builders for resource documents used as test fixtures.
 */

export interface IdentifierFixture {
  readonly type: string;
  readonly id: string | number;
}

export interface RelationshipFixture {
  readonly data?: IdentifierFixture | readonly IdentifierFixture[] | null;
  readonly links?: Readonly<Record<string, string | { href: string } | null>>;
  readonly meta?: Readonly<Record<string, unknown>>;
}

export interface ResourceFixture extends IdentifierFixture {
  readonly attributes?: Readonly<Record<string, unknown>>;
  readonly relationships?: Readonly<Record<string, RelationshipFixture>>;
  readonly links?: Readonly<Record<string, string | { href: string; meta?: Record<string, unknown> } | null>>;
  readonly meta?: Readonly<Record<string, unknown>>;
}

export interface DocumentExtras {
  readonly included?: readonly ResourceFixture[];
  readonly links?: Readonly<Record<string, string | null>>;
  readonly meta?: Readonly<Record<string, unknown>>;
}

export interface ErrorFixture {
  readonly status?: string;
  readonly code?: string;
  readonly title?: string;
  readonly detail?: string;
}

export type DocumentFixture = Readonly<Record<string, unknown>>;

const encoder = new TextEncoder();

export function encodeDocument(document: DocumentFixture): Uint8Array {
  return encoder.encode(JSON.stringify(document));
}

export function resourceDocument(
  data: ResourceFixture | readonly ResourceFixture[] | null,
  extras: DocumentExtras = {},
): DocumentFixture {
  return { data, ...extras };
}

/**
 * One page of a collection. `next` becomes the page's `next` link.
 */
export function pageDocument(
  data: readonly ResourceFixture[],
  options: { readonly next?: string; readonly meta?: Readonly<Record<string, unknown>> } = {},
): DocumentFixture {
  const document: Record<string, unknown> = { data };
  if (options.next !== undefined) {
    document["links"] = { next: options.next };
  }
  if (options.meta !== undefined) {
    document["meta"] = options.meta;
  }
  return document;
}

export function errorDocument(errors: readonly ErrorFixture[]): DocumentFixture {
  return { errors };
}
