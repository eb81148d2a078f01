import {
  DEFAULT_BINDING_TTL_SECONDS,
  type ThreadBinding,
  type ThreadBindingStore,
  type ThreadBindingStoreContext,
} from '@assistant-gw/core';
import { Redis } from 'ioredis';
import { z } from 'zod';

const threadBindingSchema = z.object({
  threadId: z.string().min(1),
  createdAt: z.number(),
  lastTurnAt: z.number().optional(),
});

/** Redis commands the binding store issues; an ioredis client satisfies it. */
export interface BindingRedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, expiryMode: 'EX', seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
}

/** Options used to configure the Redis-backed binding store. */
export interface RedisThreadBindingStoreOptions extends ThreadBindingStoreContext {
  url?: string;
  /** Externally managed client; the store never connects or closes it. */
  client?: BindingRedisCommands;
  defaultTtlSeconds?: number;
}

/** Thread binding store backed by Redis, one JSON value per user with an expiry. */
export class RedisThreadBindingStore implements ThreadBindingStore {
  private readonly redis: BindingRedisCommands;
  private readonly ownedClient?: Redis;
  private readonly prefix: string;
  private readonly defaultTtlSeconds: number;

  constructor(options: RedisThreadBindingStoreOptions = {}) {
    if (options.client) {
      this.redis = options.client;
    } else if (options.url) {
      // Managed Redis hosts may resolve IPv6-only; `family=0` lets ioredis use either family.
      const redisUrl = new URL(options.url);
      if (!redisUrl.searchParams.has('family')) {
        redisUrl.searchParams.set('family', '0');
      }

      const client = new Redis(redisUrl.toString(), { lazyConnect: true });
      this.ownedClient = client;
      this.redis = client;
    } else {
      throw new Error('RedisThreadBindingStore requires either a client or a url.');
    }

    this.prefix = options.prefix ?? 'binding:';
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_BINDING_TTL_SECONDS;
  }

  async read(userId: string): Promise<ThreadBinding | undefined> {
    await this.ensureConnected();
    const key = this.namespaced(userId);
    const raw = await this.redis.get(key);

    if (!raw) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      await this.redis.del(key);
      throw new Error(
        `Failed to parse thread binding for user ${userId}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const binding = threadBindingSchema.safeParse(parsed);
    if (!binding.success) {
      await this.redis.del(key);
      throw new Error(`Stored thread binding for user ${userId} has an unexpected shape`);
    }

    return binding.data;
  }

  async write(userId: string, binding: ThreadBinding, ttlSeconds?: number): Promise<void> {
    await this.ensureConnected();
    const ttl = ttlSeconds ?? this.defaultTtlSeconds;
    await this.redis.set(this.namespaced(userId), JSON.stringify(binding), 'EX', ttl);
  }

  async delete(userId: string): Promise<void> {
    await this.ensureConnected();
    await this.redis.del(this.namespaced(userId));
  }

  async close(): Promise<void> {
    if (this.ownedClient) {
      await this.ownedClient.quit();
    }
  }

  private namespaced(userId: string): string {
    return `${this.prefix}${userId}`;
  }

  private async ensureConnected(): Promise<void> {
    const client = this.ownedClient;
    if (!client || client.status === 'ready' || client.status === 'connecting') {
      return;
    }

    await client.connect();
  }
}
