import type { ClientResult } from '@assistant-gw/assistant-client';
import { describe, expect, it, vi } from 'vitest';

import { callWithRetry, computeBackoff, pause, type RetryContext } from '../src/runs/retry';

import { fatal, transient } from './support/fake-assistant-client';
import { createFakeTimers, type FakeTimers } from './support/harness';

function createContext(timers: FakeTimers, overrides: Partial<RetryContext> = {}): RetryContext {
  return {
    schedule: { pollIntervalMs: 1000, maxBackoffMs: 8000, retryBudget: 3 },
    deadline: timers.now() + 60_000,
    sleep: timers.sleep,
    now: timers.now,
    ...overrides,
  };
}

function scripted<T>(...results: ClientResult<T>[]): () => Promise<ClientResult<T>> {
  return async () => {
    const next = results.shift();
    if (!next) {
      throw new Error('No scripted result left');
    }
    return next;
  };
}

describe('computeBackoff', () => {
  it.each([
    [0, 1000],
    [1, 2000],
    [2, 4000],
    [3, 8000],
    [6, 8000],
  ])('step %i waits %i ms', (step, expected) => {
    expect(computeBackoff(step, 1000, 8000)).toBe(expected);
  });
});

describe('callWithRetry', () => {
  it('returns the first successful result', async () => {
    const timers = createFakeTimers();
    const onRetry = vi.fn();

    const outcome = await callWithRetry(
      scripted<string>({ ok: false, failure: transient() }, { ok: true, value: 'thread-1' }),
      createContext(timers, { onRetry }),
    );

    expect(outcome).toEqual({ ok: true, value: 'thread-1' });
    expect(timers.delays).toEqual([1000]);
    expect(onRetry).toHaveBeenCalledWith({ attempt: 1, delayMs: 1000, failure: transient() });
  });

  it('caps a server requested delay at the maximum backoff', async () => {
    const timers = createFakeTimers();

    await callWithRetry(
      scripted<string>({ ok: false, failure: transient('Rate limited', 20_000) }, { ok: true, value: 'ok' }),
      createContext(timers),
    );

    expect(timers.delays).toEqual([8000]);
  });

  it('does not retry fatal failures', async () => {
    const timers = createFakeTimers();

    const outcome = await callWithRetry(
      scripted<string>({ ok: false, failure: fatal('No thread found with id thread-9', 404) }),
      createContext(timers),
    );

    expect(outcome).toEqual({
      ok: false,
      category: 'RemoteFatal',
      message: 'No thread found with id thread-9',
      status: 404,
    });
    expect(timers.delays).toEqual([]);
  });

  it('stops retrying at the deadline', async () => {
    const timers = createFakeTimers();
    const operation = scripted<string>(
      { ok: false, failure: transient() },
      { ok: false, failure: transient() },
    );

    const outcome = await callWithRetry(operation, createContext(timers, { deadline: 1500 }));

    expect(outcome).toEqual({
      ok: false,
      category: 'Timeout',
      message: 'Run budget exhausted before the call completed',
    });
    expect(timers.delays).toEqual([1000, 500]);
  });

  it('reports an aborted call as cancelled', async () => {
    const timers = createFakeTimers();
    const controller = new AbortController();
    controller.abort();

    const outcome = await callWithRetry(
      scripted<string>({ ok: true, value: 'never' }),
      createContext(timers, { signal: controller.signal }),
    );

    expect(outcome).toEqual({
      ok: false,
      category: 'Timeout',
      message: 'Turn was cancelled',
      aborted: true,
    });
  });

  it('stops waiting on a call in flight when the signal aborts', async () => {
    const timers = createFakeTimers();
    const controller = new AbortController();
    const received: Array<AbortSignal | undefined> = [];

    const outcome = callWithRetry<string>(
      (signal) => {
        received.push(signal);
        return new Promise<ClientResult<string>>(() => undefined);
      },
      createContext(timers, { signal: controller.signal }),
    );
    controller.abort();

    await expect(outcome).resolves.toEqual({
      ok: false,
      category: 'Timeout',
      message: 'Turn was cancelled',
      aborted: true,
    });
    expect(received).toHaveLength(1);
    expect(received[0]).toBe(controller.signal);
  });
});

describe('pause', () => {
  it('clips the wait to the remaining budget', async () => {
    const timers = createFakeTimers(9000);

    await expect(pause(createContext(timers, { deadline: 10_000 }), 4000)).resolves.toBe(true);
    expect(timers.delays).toEqual([1000]);
  });

  it('resolves false when the sleep is interrupted by an abort', async () => {
    const timers = createFakeTimers();
    const controller = new AbortController();
    const context = createContext(timers, {
      signal: controller.signal,
      sleep: async () => {
        controller.abort();
        throw new Error('The operation was aborted');
      },
    });

    await expect(pause(context, 1000)).resolves.toBe(false);
  });
});
