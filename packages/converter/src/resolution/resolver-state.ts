/**
 * Result of dereferencing one relationship link. `null` means the link was
 * visited but produced nothing to store.
 */
export type LinkVisit =
  | { readonly visited: false }
  | { readonly visited: true; readonly value: unknown };

/**
 * Per-conversion record of relationship links already dereferenced, keyed
 * by href. Keyed by link rather than identity because the identity behind a
 * link is unknown until its document arrives.
 */
export class ResolverState {
  private readonly visits = new Map<string, { value: unknown }>();

  lookup(link: string): LinkVisit {
    const visit = this.visits.get(link);
    return visit ? { visited: true, value: visit.value } : { visited: false };
  }

  markVisited(link: string): void {
    if (!this.visits.has(link)) {
      this.visits.set(link, { value: null });
    }
  }

  store(link: string, value: unknown): void {
    this.visits.set(link, { value });
  }
}
