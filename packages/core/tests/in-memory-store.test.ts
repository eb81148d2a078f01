import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { InMemoryThreadBindingStore } from '../src/bindings';

describe('InMemoryThreadBindingStore', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns a copy of the stored binding', async () => {
    const store = new InMemoryThreadBindingStore();
    await store.write('user-1', { threadId: 'thread-1', createdAt: 10 });

    const binding = await store.read('user-1');
    expect(binding).toEqual({ threadId: 'thread-1', createdAt: 10 });

    if (binding) {
      binding.threadId = 'changed';
    }
    await expect(store.read('user-1')).resolves.toEqual({ threadId: 'thread-1', createdAt: 10 });
  });

  it('expires bindings after their ttl', async () => {
    const store = new InMemoryThreadBindingStore();
    await store.write('user-1', { threadId: 'thread-1', createdAt: 0 }, 60);

    vi.advanceTimersByTime(60_000);
    await expect(store.read('user-1')).resolves.toEqual({ threadId: 'thread-1', createdAt: 0 });

    vi.advanceTimersByTime(1);
    await expect(store.read('user-1')).resolves.toBeUndefined();
  });

  it('deletes a binding', async () => {
    const store = new InMemoryThreadBindingStore({ prefix: 'test:' });
    await store.write('user-1', { threadId: 'thread-1', createdAt: 0 });

    await store.delete('user-1');

    await expect(store.read('user-1')).resolves.toBeUndefined();
  });
});
