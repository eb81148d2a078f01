import { InMemoryThreadBindingStore, type ThreadBindingStore } from '@assistant-gw/core';

import type { AppConfig } from '../../config/env';

import { RedisThreadBindingStore } from './redis-store';

export {
  RedisThreadBindingStore,
  type BindingRedisCommands,
  type RedisThreadBindingStoreOptions,
} from './redis-store';

const BINDING_PREFIX = 'assistant-gw:binding:';

/**
 * Create the configured binding store: in-memory for local development,
 * Redis when the driver asks for it.
 */
export function createBindingStore(config: AppConfig): ThreadBindingStore {
  if (config.bindings.driver === 'redis') {
    if (!config.bindings.redisUrl) {
      throw new Error('BINDING_STORE_DRIVER=redis requires REDIS_URL environment variable');
    }

    return new RedisThreadBindingStore({ url: config.bindings.redisUrl, prefix: BINDING_PREFIX });
  }

  return new InMemoryThreadBindingStore({ prefix: BINDING_PREFIX });
}
