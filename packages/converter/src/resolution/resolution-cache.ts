/**
 * Identity key → materialized instance, for one top-level conversion.
 * The only place where instances of that conversion are owned; relationship
 * fields hold references into it.
 */
export class ResolutionCache {
  private readonly objects = new Map<string, object>();

  get(key: string): object | undefined {
    return this.objects.get(key);
  }

  has(key: string): boolean {
    return this.objects.has(key);
  }

  /**
   * Registered before the instance's relationships are resolved, so cycles
   * land on the partially populated instance.
   */
  put(key: string, instance: object): void {
    this.objects.set(key, instance);
  }
}
