import { setTimeout as sleepFor } from 'node:timers/promises';

import type { ClientFailure, ClientResult } from '@assistant-gw/assistant-client';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
export type Clock = () => number;

export interface RetrySchedule {
  /** Base delay between polls and between transient retries. */
  pollIntervalMs: number;
  /** Upper bound for any single wait. */
  maxBackoffMs: number;
  /** Consecutive transient failures tolerated before giving up. */
  retryBudget: number;
}

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  failure: ClientFailure;
}

export interface RetryContext {
  schedule: RetrySchedule;
  deadline: number;
  sleep: Sleep;
  now: Clock;
  signal?: AbortSignal;
  onRetry?(event: RetryEvent): void;
}

export type RetryFailureCategory = 'Timeout' | 'RemoteFatal';

export type RetryOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; category: RetryFailureCategory; message: string; status?: number; aborted?: boolean };

export const defaultSleep: Sleep = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

/** Exponential delay for the given step: `base * 2^step`, capped at `max`. */
export function computeBackoff(step: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * 2 ** step, maxMs);
}

/**
 * Wait for `ms`, clipped to the remaining budget. Resolves `false` when the
 * wait was interrupted by the abort signal.
 */
export async function pause(context: RetryContext, ms: number): Promise<boolean> {
  if (context.signal?.aborted) {
    return false;
  }

  const remaining = context.deadline - context.now();
  const delay = Math.max(0, Math.min(ms, remaining));

  try {
    await context.sleep(delay, context.signal);
    return true;
  } catch (error) {
    if (context.signal?.aborted) {
      return false;
    }
    throw error;
  }
}

/**
 * Apply the transient retry policy to a single client call. Fatal failures
 * return immediately; transient ones are retried on the backoff schedule
 * until the budget or the deadline runs out. The operation receives the
 * context's abort signal, and an abort stops waiting on a call still in
 * flight.
 */
export async function callWithRetry<T>(
  operation: (signal: AbortSignal | undefined) => Promise<ClientResult<T>>,
  context: RetryContext,
): Promise<RetryOutcome<T>> {
  const { schedule } = context;
  let failures = 0;

  for (;;) {
    if (context.signal?.aborted) {
      return abortedOutcome();
    }

    if (context.now() >= context.deadline) {
      return { ok: false, category: 'Timeout', message: 'Run budget exhausted before the call completed' };
    }

    const result = await untilAborted(operation(context.signal), context.signal);
    if (!result) {
      return abortedOutcome();
    }
    if (result.ok) {
      return result;
    }

    const { failure } = result;
    if (failure.kind === 'fatal') {
      return { ok: false, category: 'RemoteFatal', message: failure.message, status: failure.status };
    }

    failures += 1;
    if (failures > schedule.retryBudget) {
      return {
        ok: false,
        category: 'Timeout',
        message: `Retry budget exhausted after ${failures} transient failures: ${failure.message}`,
      };
    }

    const backoff = computeBackoff(failures - 1, schedule.pollIntervalMs, schedule.maxBackoffMs);
    const delayMs = Math.min(Math.max(backoff, failure.retryAfterMs ?? 0), schedule.maxBackoffMs);

    context.onRetry?.({ attempt: failures, delayMs, failure });

    if (!(await pause(context, delayMs))) {
      return abortedOutcome();
    }
  }
}

/** Resolves `undefined` as soon as the signal aborts, otherwise with the pending value. */
function untilAborted<T extends object>(pending: Promise<T>, signal?: AbortSignal): Promise<T | undefined> {
  if (!signal) {
    return pending;
  }

  return new Promise<T | undefined>((resolve, reject) => {
    const onAbort = () => resolve(undefined);
    if (signal.aborted) {
      onAbort();
      return;
    }

    signal.addEventListener('abort', onAbort, { once: true });
    void pending.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

function abortedOutcome(): { ok: false; category: 'Timeout'; message: string; aborted: true } {
  return { ok: false, category: 'Timeout', message: 'Turn was cancelled', aborted: true };
}
