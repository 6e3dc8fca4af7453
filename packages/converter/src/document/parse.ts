/**
 * Wire document decoding: bytes → JSON tree → validated envelope.
 */

import { type ApiErrorObject, MalformedDocumentError, type ValidationIssue } from "@graphwire/errors";
import type { ZodIssue } from "zod";
import type { Link, Links, WireInput } from "../types.js";
import {
  DocumentSchema,
  type WireDocument,
  type WireErrorObject,
  type WireLink,
  type WireLinks,
  type WireResource,
} from "./schema.js";

const decoder = new TextDecoder("utf-8");

function toIssue(issue: ZodIssue): ValidationIssue {
  return {
    path: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  };
}

/**
 * Decode and validate one wire document.
 *
 * @throws MalformedDocumentError (DOCUMENT_INVALID_JSON, DOCUMENT_MALFORMED)
 */
export function parseDocument(input: WireInput): WireDocument {
  const text = typeof input === "string" ? input : decoder.decode(input);

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new MalformedDocumentError({
      code: "DOCUMENT_INVALID_JSON",
      message: `Document is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      cause: error,
    });
  }

  const parsed = DocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(toIssue);
    throw new MalformedDocumentError({
      code: "DOCUMENT_MALFORMED",
      message: `Document does not match the resource document envelope: ${issues
        .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
        .join("; ")}`,
      issues,
    });
  }
  return parsed.data;
}

export function toApiErrors(errors: readonly WireErrorObject[]): ApiErrorObject[] {
  return errors.map((error) => ({
    id: error.id,
    status: error.status,
    code: error.code,
    title: error.title,
    detail: error.detail,
    source: error.source,
    meta: error.meta,
  }));
}

/**
 * Render a document's errors as one message, one line per error.
 */
export function formatApiErrors(errors: readonly ApiErrorObject[]): string {
  return errors
    .map((error) => {
      let line = "";
      if (error.title !== undefined) line += `${error.title}: `;
      if (error.code !== undefined) line += `Error code: ${error.code} `;
      if (error.detail !== undefined) line += `Detail: ${error.detail}`;
      return line.trimEnd();
    })
    .join("\n");
}

/**
 * @throws MalformedDocumentError (DOCUMENT_HAS_ERRORS) when the document carries errors
 */
export function ensureNotError(document: WireDocument): void {
  if (document.errors !== undefined) {
    const apiErrors = toApiErrors(document.errors);
    throw new MalformedDocumentError({
      code: "DOCUMENT_HAS_ERRORS",
      message: `Document carries errors:\n${formatApiErrors(apiErrors)}`,
      apiErrors,
    });
  }
}

/**
 * @throws MalformedDocumentError (DOCUMENT_EXPECTED_OBJECT)
 */
export function ensureObject(document: WireDocument): WireResource {
  const data = document.data;
  if (data === undefined || data === null || Array.isArray(data)) {
    throw new MalformedDocumentError({
      code: "DOCUMENT_EXPECTED_OBJECT",
      message: "Primary data must be a single resource object",
    });
  }
  return data;
}

/**
 * @throws MalformedDocumentError (DOCUMENT_EXPECTED_COLLECTION)
 */
export function ensureCollection(document: WireDocument): WireResource[] {
  const data = document.data;
  if (!Array.isArray(data)) {
    throw new MalformedDocumentError({
      code: "DOCUMENT_EXPECTED_COLLECTION",
      message: "Primary data must be an array of resource objects",
    });
  }
  return data;
}

/**
 * Normalize one link. Both `"http://..."` and `{ "href": "http://..." }` are
 * accepted; `null` yields undefined.
 */
export function toLink(link: WireLink | undefined): Link | undefined {
  if (link === undefined || link === null) {
    return undefined;
  }
  if (typeof link === "string") {
    return { href: link };
  }
  return link.meta === undefined ? { href: link.href } : { href: link.href, meta: link.meta };
}

/**
 * Normalize a links bag, dropping null links.
 */
export function toLinks(links: WireLinks | undefined): Links | undefined {
  if (links === undefined) {
    return undefined;
  }
  const result: Record<string, Link> = {};
  for (const [name, value] of Object.entries(links)) {
    const link = toLink(value);
    if (link) {
      result[name] = link;
    }
  }
  return result;
}
