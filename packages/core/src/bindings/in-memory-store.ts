import {
  DEFAULT_BINDING_TTL_SECONDS,
  type ThreadBinding,
  type ThreadBindingStore,
  type ThreadBindingStoreContext,
} from './store';

interface MemoryEntry {
  value: ThreadBinding;
  expiresAt: number;
}

/** Map-based binding store used for local development and tests. */
export class InMemoryThreadBindingStore implements ThreadBindingStore {
  private readonly store = new Map<string, MemoryEntry>();
  private readonly prefix: string;

  constructor(context: ThreadBindingStoreContext = {}) {
    this.prefix = context.prefix ?? 'binding:';
  }

  async read(userId: string): Promise<ThreadBinding | undefined> {
    const key = this.namespaced(userId);
    const entry = this.store.get(key);

    if (!entry) {
      return undefined;
    }

    if (Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }

    return { ...entry.value };
  }

  async write(userId: string, binding: ThreadBinding, ttlSeconds?: number): Promise<void> {
    const expiresIn = (ttlSeconds ?? DEFAULT_BINDING_TTL_SECONDS) * 1000;

    this.store.set(this.namespaced(userId), {
      value: { ...binding },
      expiresAt: Date.now() + expiresIn,
    });
  }

  async delete(userId: string): Promise<void> {
    this.store.delete(this.namespaced(userId));
  }

  private namespaced(userId: string): string {
    return `${this.prefix}${userId}`;
  }
}
