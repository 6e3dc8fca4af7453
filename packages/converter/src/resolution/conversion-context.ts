import { ResolutionCache } from "./resolution-cache.js";
import { ResolverState } from "./resolver-state.js";

/**
 * State owned by one top-level conversion call and shared by every nested
 * resolution it triggers, including documents fetched through relationship
 * links. Never reused across calls.
 */
export class ConversionContext {
  readonly cache = new ResolutionCache();
  readonly state = new ResolverState();
  /** Id-only stubs by identity key; kept apart from the cache so a full resource still wins */
  readonly stubs = new Map<string, object>();
}
