/**
 * RecordingResolver: an in-memory link resolver for tests.
 *
 * Serves configured fixtures by link and records every call so tests can
 * assert what was fetched, and how often. Unknown links fail.
 */

import { type DocumentFixture, encodeDocument } from "./documents.js";

export type RecordedResponse = DocumentFixture | string | Uint8Array | Error;

export class RecordingResolver {
  readonly calls: string[] = [];
  private readonly responses = new Map<string, RecordedResponse>();

  constructor(fixtures: Readonly<Record<string, RecordedResponse>> = {}) {
    for (const [link, response] of Object.entries(fixtures)) {
      this.responses.set(link, response);
    }
  }

  serve(link: string, response: RecordedResponse): this {
    this.responses.set(link, response);
    return this;
  }

  async resolve(link: string): Promise<Uint8Array | string> {
    this.calls.push(link);
    const response = this.responses.get(link);

    if (response === undefined) {
      throw new Error(`RecordingResolver: no fixture for link "${link}"`);
    }
    if (response instanceof Error) {
      throw response;
    }
    if (typeof response === "string" || response instanceof Uint8Array) {
      return response;
    }
    return encodeDocument(response);
  }

  callsFor(link: string): number {
    return this.calls.filter((call) => call === link).length;
  }

  get callCount(): number {
    return this.calls.length;
  }

  reset(): void {
    this.calls.length = 0;
  }
}
