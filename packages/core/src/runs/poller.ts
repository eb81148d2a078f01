import {
  isTerminalStatus,
  type AssistantClient,
  type RunHandle,
  type RunSnapshot,
  type RunStatus,
} from '@assistant-gw/assistant-client';

import type { LoggerLike } from '../logger';
import type { NotificationPublisher } from '../notifications/publisher';
import type { ToolDispatcher } from '../tools/dispatcher';
import type { DispatchedEffect } from '../tools/types';

import {
  callWithRetry,
  computeBackoff,
  pause,
  type RetryContext,
  type RetryEvent,
  type RetryOutcome,
} from './retry';

export type RunFailureCategory = 'Timeout' | 'RemoteFatal' | 'ToolFailure';

export type RunOutcome =
  | {
      ok: true;
      run: RunHandle;
      text: string;
      effects: DispatchedEffect[];
    }
  | {
      ok: false;
      run: RunHandle;
      category: RunFailureCategory;
      message: string;
      runStatus?: RunStatus;
      /** True when the remote run may still be executing and must be reconciled later. */
      remoteMayBeActive: boolean;
      effects: DispatchedEffect[];
    };

export type SettleOutcome =
  | { ok: true; status: RunStatus }
  | { ok: false; category: 'Timeout' | 'RemoteFatal'; message: string };

/** Lifecycle hooks surfaced while a run is being driven. */
export interface RunLifecycleHandlers {
  onStatusChange?(event: { run: RunHandle; from: RunStatus; to: RunStatus }): void;
  onRetry?(event: RetryEvent): void;
  onToolRound?(event: { run: RunHandle; calls: number; outcome: 'submitted' | 'aborted' }): void;
}

export interface RunPollerDependencies {
  client: AssistantClient;
  dispatcher: ToolDispatcher;
  publisher: NotificationPublisher;
  logger?: LoggerLike;
  handlers?: RunLifecycleHandlers;
}

export interface PollContext {
  userId: string;
  retry: RetryContext;
}

/**
 * Drives one remote run from creation to a terminal state. Polls on an
 * exponential schedule that resets on every state change, resolves tool
 * rounds through the dispatcher and bounds the whole run by the retry
 * context's deadline.
 */
export class RunPoller {
  private status: RunStatus = 'Queued';
  private step = 0;
  private readonly submittedCalls = new Set<string>();
  private readonly effects: DispatchedEffect[] = [];

  constructor(
    private readonly deps: RunPollerDependencies,
    private readonly run: RunHandle,
    private readonly context: PollContext,
  ) {}

  async poll(): Promise<RunOutcome> {
    const { client } = this.deps;
    const retry = this.context.retry;

    for (;;) {
      if (retry.signal?.aborted) {
        return this.fail('Timeout', 'Turn was cancelled', true);
      }

      if (retry.now() >= retry.deadline) {
        return this.fail('Timeout', 'Run exceeded its wall-clock budget', true);
      }

      const polled = await callWithRetry((signal) => client.getRun(this.run, { signal }), retry);
      if (!polled.ok) {
        return this.failFromRetry(polled);
      }

      const snapshot = polled.value;
      this.observe(snapshot.status);

      switch (snapshot.status) {
        case 'Completed':
          return this.complete(retry);
        case 'Failed':
        case 'Cancelled':
        case 'Expired':
          return this.fail('RemoteFatal', describeRemoteFailure(snapshot), false);
        case 'RequiresAction': {
          const round = await this.resolveToolCalls(snapshot, retry);
          if (round) {
            return round;
          }
          break;
        }
        default:
          break;
      }

      if (!(await pause(retry, this.nextDelay()))) {
        return this.fail('Timeout', 'Turn was cancelled', true);
      }
    }
  }

  /**
   * Poll an existing run until it is terminal without dispatching any tool
   * calls. Used to drain a run that is being discarded.
   */
  async settle(): Promise<SettleOutcome> {
    const retry = this.context.retry;

    for (;;) {
      if (retry.now() >= retry.deadline) {
        return { ok: false, category: 'Timeout', message: 'Run did not settle within its budget' };
      }

      const polled = await callWithRetry((signal) => this.deps.client.getRun(this.run, { signal }), retry);
      if (!polled.ok) {
        return { ok: false, category: polled.category, message: polled.message };
      }

      this.observe(polled.value.status);
      if (isTerminalStatus(polled.value.status)) {
        return { ok: true, status: polled.value.status };
      }

      if (!(await pause(retry, this.nextDelay()))) {
        return { ok: false, category: 'Timeout', message: 'Turn was cancelled' };
      }
    }
  }

  /** Returns a terminal outcome when the round cannot continue, otherwise undefined. */
  private async resolveToolCalls(
    snapshot: RunSnapshot,
    retry: RetryContext,
  ): Promise<RunOutcome | undefined> {
    const { dispatcher, publisher, client, logger, handlers } = this.deps;
    const pending = snapshot.toolCalls.filter((call) => !this.submittedCalls.has(call.id));

    if (pending.length === 0) {
      // Stale RequiresAction replay for a round that was already submitted.
      return undefined;
    }

    const origin = { userId: this.context.userId, ...this.run };
    const round = await dispatcher.resolve(origin, pending);

    if (!round.ok) {
      handlers?.onToolRound?.({ run: this.run, calls: pending.length, outcome: 'aborted' });
      return this.fail(
        'ToolFailure',
        `Tool "${round.failure.tool}" failed: ${round.failure.message}`,
        true,
      );
    }

    publisher.publishEffects(round.effects, origin, retry.now());
    this.effects.push(...round.effects);

    const submitted = await callWithRetry(
      (signal) => client.submitToolOutputs(this.run, round.results, { signal }),
      retry,
    );
    if (!submitted.ok) {
      return this.failFromRetry(submitted);
    }

    for (const call of pending) {
      this.submittedCalls.add(call.id);
    }

    logger?.debug?.(
      { ...origin, calls: round.results.length },
      'Submitted tool outputs',
    );
    handlers?.onToolRound?.({ run: this.run, calls: round.results.length, outcome: 'submitted' });

    this.observe(submitted.value.status);
    this.step = 0;
    return undefined;
  }

  private async complete(retry: RetryContext): Promise<RunOutcome> {
    const message = await callWithRetry(
      (signal) => this.deps.client.getLatestMessage(this.run.threadId, this.run.runId, { signal }),
      retry,
    );

    if (!message.ok) {
      return this.fail(message.category, message.message, false);
    }

    if (message.value === undefined) {
      return this.fail('RemoteFatal', 'Run completed without an assistant reply', false);
    }

    return { ok: true, run: this.run, text: message.value, effects: [...this.effects] };
  }

  private observe(next: RunStatus): void {
    if (next === this.status) {
      return;
    }

    this.deps.handlers?.onStatusChange?.({ run: this.run, from: this.status, to: next });
    this.deps.logger?.debug?.(
      { ...this.run, from: this.status, to: next },
      'Run status changed',
    );
    this.status = next;
    this.step = 0;
  }

  private nextDelay(): number {
    const { pollIntervalMs, maxBackoffMs } = this.context.retry.schedule;
    const delay = computeBackoff(this.step, pollIntervalMs, maxBackoffMs);
    this.step += 1;
    return delay;
  }

  private failFromRetry(outcome: Extract<RetryOutcome<unknown>, { ok: false }>): RunOutcome {
    return this.fail(outcome.category, outcome.message, outcome.category === 'Timeout');
  }

  private fail(
    category: RunFailureCategory,
    message: string,
    remoteMayBeActive: boolean,
  ): RunOutcome {
    return {
      ok: false,
      run: this.run,
      category,
      message,
      runStatus: this.status,
      remoteMayBeActive,
      effects: [...this.effects],
    };
  }
}

function describeRemoteFailure(snapshot: RunSnapshot): string {
  const reason = snapshot.lastError?.message;
  return reason
    ? `Run ended with status ${snapshot.status}: ${reason}`
    : `Run ended with status ${snapshot.status}`;
}
