/** Remote thread owned by a user, persisted so evicted sessions resume it. */
export interface ThreadBinding {
  threadId: string;
  createdAt: number;
  lastTurnAt?: number;
}

/** Interface implemented by thread binding store drivers. */
export interface ThreadBindingStore {
  read(userId: string): Promise<ThreadBinding | undefined>;
  write(userId: string, binding: ThreadBinding, ttlSeconds?: number): Promise<void>;
  delete(userId: string): Promise<void>;
}

/** Optional configuration for binding store instances. */
export interface ThreadBindingStoreContext {
  prefix?: string;
}

/** Default expiry for thread bindings (30 days). */
export const DEFAULT_BINDING_TTL_SECONDS = 30 * 24 * 60 * 60;
