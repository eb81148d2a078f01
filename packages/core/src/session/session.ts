import {
  isTerminalStatus,
  type AssistantClient,
  type RunHandle,
  type RunSnapshot,
} from '@assistant-gw/assistant-client';

import type { ThreadBinding, ThreadBindingStore } from '../bindings/store';
import type { LoggerLike } from '../logger';
import type { NotificationPublisher } from '../notifications/publisher';
import { formatReply, type ReplyFormat } from '../reply-format';
import { RunPoller, type RunLifecycleHandlers } from '../runs/poller';
import {
  callWithRetry,
  defaultSleep,
  type Clock,
  type RetryContext,
  type RetryOutcome,
  type RetrySchedule,
  type Sleep,
} from '../runs/retry';
import type { ToolDispatcher } from '../tools/dispatcher';

import type { SessionSummary, TurnError, TurnOptions, TurnResult } from './types';

export interface RunPolicy extends RetrySchedule {
  /** Wall-clock ceiling for one turn's remote work. */
  runTimeoutMs: number;
  replyFormat?: ReplyFormat;
  bindingTtlSeconds?: number;
}

export const DEFAULT_RUN_POLICY: RunPolicy = {
  pollIntervalMs: 1000,
  maxBackoffMs: 8000,
  retryBudget: 5,
  runTimeoutMs: 60_000,
  replyFormat: 'plain',
};

export interface SessionDependencies {
  client: AssistantClient;
  dispatcher: ToolDispatcher;
  publisher: NotificationPublisher;
  bindings: ThreadBindingStore;
  policy: RunPolicy;
  logger?: LoggerLike;
  handlers?: RunLifecycleHandlers;
  sleep?: Sleep;
  now?: Clock;
}

type Failure = Extract<RetryOutcome<unknown>, { ok: false }>;

/**
 * Serializes all activity on one user's thread. At most one turn is in flight
 * per session; a second call while a run is active is rejected as `Busy`
 * before any remote call is made.
 */
export class ConversationSession {
  private threadId?: string;
  private binding?: ThreadBinding;
  private activeRun?: RunHandle;
  private orphanedRun?: RunHandle;
  private needsRemoteCheck = false;
  private restoredThread = false;
  private turnInFlight = false;
  private turnSequence = 0;
  private lastActiveAt: number;
  private readonly sleep: Sleep;
  private readonly now: Clock;

  constructor(
    readonly userId: string,
    private readonly deps: SessionDependencies,
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
    this.lastActiveAt = this.now();
  }

  get busy(): boolean {
    return this.turnInFlight;
  }

  summary(): SessionSummary {
    return {
      userId: this.userId,
      threadId: this.threadId,
      activeRun: this.activeRun ? { ...this.activeRun } : undefined,
      orphanedRun: this.orphanedRun ? { ...this.orphanedRun } : undefined,
      turnSequence: this.turnSequence,
      busy: this.turnInFlight,
      lastActiveAt: this.lastActiveAt,
    };
  }

  async handleTurn(text: string, options: TurnOptions = {}): Promise<TurnResult> {
    if (this.turnInFlight) {
      return {
        ok: false,
        error: {
          category: 'Busy',
          message: 'A previous turn is still being processed for this user',
          threadId: this.threadId,
          runId: this.activeRun?.runId,
        },
      };
    }

    this.turnInFlight = true;
    this.turnSequence += 1;
    const turn = this.turnSequence;

    try {
      return await this.runTurn(text, turn, options);
    } finally {
      this.activeRun = undefined;
      this.turnInFlight = false;
      this.lastActiveAt = this.now();
    }
  }

  private async runTurn(text: string, turn: number, options: TurnOptions): Promise<TurnResult> {
    const { client, logger } = this.deps;
    const retry = this.createRetryContext(options.signal);

    const thread = await this.ensureThread(retry);
    if (!thread.ok) {
      return this.failTurn(turn, thread);
    }
    let threadId = thread.value;

    const reconciled = await this.reconcile(threadId, retry);
    if (reconciled && this.restoredThread && reconciled.status === 404) {
      const replaced = await this.replaceStaleThread(threadId, retry);
      if (!replaced.ok) {
        return this.failTurn(turn, replaced);
      }
      threadId = replaced.value;
    } else if (reconciled) {
      return this.failTurn(turn, reconciled);
    }
    this.restoredThread = false;

    const posted = await callWithRetry((signal) => client.postMessage(threadId, text, { signal }), retry);
    if (!posted.ok) {
      return this.failTurn(turn, posted);
    }

    const created = await callWithRetry((signal) => client.createRun(threadId, { signal }), retry);
    if (!created.ok) {
      // The run may have been created even though the response never arrived.
      this.needsRemoteCheck = created.category === 'Timeout';
      return this.failTurn(turn, created);
    }

    const run: RunHandle = { threadId, runId: created.value.runId };
    this.activeRun = run;
    logger?.info?.({ userId: this.userId, ...run, turn }, 'Run started');

    const poller = new RunPoller(this.deps, run, { userId: this.userId, retry });
    const outcome = await poller.poll();

    if (!outcome.ok) {
      if (outcome.remoteMayBeActive) {
        this.orphanedRun = run;
      }
      logger?.warn?.(
        { userId: this.userId, ...run, turn, category: outcome.category, error: outcome.message },
        'Run did not complete',
      );
      return {
        ok: false,
        error: {
          category: outcome.category,
          message: outcome.message,
          turn,
          threadId,
          runId: run.runId,
          runStatus: outcome.runStatus,
        },
      };
    }

    await this.touchBinding(threadId);
    logger?.info?.({ userId: this.userId, ...run, turn }, 'Run completed');

    return {
      ok: true,
      reply: {
        text: formatReply(outcome.text, this.deps.policy.replyFormat),
        threadId,
        runId: run.runId,
        turn,
        effects: outcome.effects,
      },
    };
  }

  /** Resolve the user's thread: local handle, persisted binding, or a freshly created thread. */
  private async ensureThread(retry: RetryContext): Promise<RetryOutcome<string>> {
    if (this.threadId) {
      return { ok: true, value: this.threadId };
    }

    const stored = await this.readBinding();
    if (stored) {
      this.threadId = stored.threadId;
      this.binding = stored;
      this.restoredThread = true;
      // Local run bookkeeping was lost with the previous session object.
      this.needsRemoteCheck = true;
      return { ok: true, value: stored.threadId };
    }

    return this.createThread(retry);
  }

  /** Drop a stored thread the service no longer knows and start over on a new one. */
  private async replaceStaleThread(staleThreadId: string, retry: RetryContext): Promise<RetryOutcome<string>> {
    this.deps.logger?.warn?.(
      { userId: this.userId, threadId: staleThreadId },
      'Stored thread no longer exists, starting a new thread',
    );

    this.threadId = undefined;
    this.binding = undefined;
    this.orphanedRun = undefined;
    this.needsRemoteCheck = false;
    this.restoredThread = false;
    await this.deleteBinding();

    return this.createThread(retry);
  }

  private async createThread(retry: RetryContext): Promise<RetryOutcome<string>> {
    const created = await callWithRetry((signal) => this.deps.client.createThread({ signal }), retry);
    if (!created.ok) {
      return created;
    }

    const threadId = created.value;
    this.threadId = threadId;
    this.binding = { threadId, createdAt: this.now() };
    this.deps.logger?.info?.({ userId: this.userId, threadId }, 'Created conversation thread');

    await this.writeBinding(this.binding);
    this.deps.publisher.publish({
      type: 'conversation_started',
      userId: this.userId,
      threadId,
      occurredAt: this.now(),
    });

    return { ok: true, value: threadId };
  }

  /**
   * Make sure no run is live on the thread before a new message is posted.
   * A non-terminal leftover run is cancelled and drained, never run alongside.
   */
  private async reconcile(threadId: string, retry: RetryContext): Promise<Failure | undefined> {
    const { client, logger } = this.deps;
    let leftover: RunSnapshot | undefined;

    if (this.orphanedRun) {
      const orphan = this.orphanedRun;
      const observed = await callWithRetry((signal) => client.getRun(orphan, { signal }), retry);
      if (!observed.ok) {
        if (observed.category !== 'RemoteFatal') {
          return observed;
        }
        logger?.warn?.({ userId: this.userId, ...orphan }, 'Orphaned run no longer readable - discarding');
      } else {
        leftover = observed.value;
      }
    } else if (this.needsRemoteCheck) {
      const latest = await callWithRetry((signal) => client.getLatestRun(threadId, { signal }), retry);
      if (!latest.ok) {
        return latest;
      }
      leftover = latest.value;
    }

    this.needsRemoteCheck = false;

    if (!leftover || isTerminalStatus(leftover.status)) {
      this.orphanedRun = undefined;
      return undefined;
    }

    const handle: RunHandle = { threadId: leftover.threadId, runId: leftover.runId };
    logger?.warn?.(
      { userId: this.userId, ...handle, status: leftover.status },
      'Cancelling leftover run before starting a new turn',
    );

    const cancelled = await callWithRetry((signal) => client.cancelRun(handle, { signal }), retry);
    if (!cancelled.ok && cancelled.category !== 'RemoteFatal') {
      this.orphanedRun = handle;
      return cancelled;
    }

    const settled = await new RunPoller(this.deps, handle, { userId: this.userId, retry }).settle();
    if (!settled.ok) {
      this.orphanedRun = handle;
      return {
        ok: false,
        category: settled.category,
        message: `Previous run is still active on this thread: ${settled.message}`,
      };
    }

    this.orphanedRun = undefined;
    return undefined;
  }

  private createRetryContext(signal?: AbortSignal): RetryContext {
    const { policy, handlers } = this.deps;
    return {
      schedule: policy,
      deadline: this.now() + policy.runTimeoutMs,
      sleep: this.sleep,
      now: this.now,
      signal,
      onRetry: (event) => {
        this.deps.logger?.debug?.(
          { userId: this.userId, attempt: event.attempt, delayMs: event.delayMs, error: event.failure.message },
          'Retrying transient assistant API failure',
        );
        handlers?.onRetry?.(event);
      },
    };
  }

  private failTurn(turn: number, failure: Failure): TurnResult {
    const error: TurnError = {
      category: failure.category,
      message: failure.message,
      turn,
      threadId: this.threadId,
    };
    this.deps.logger?.warn?.(
      { userId: this.userId, turn, category: failure.category, error: failure.message },
      'Turn failed before the run completed',
    );
    return { ok: false, error };
  }

  private async readBinding(): Promise<ThreadBinding | undefined> {
    try {
      return await this.deps.bindings.read(this.userId);
    } catch (error) {
      this.deps.logger?.warn?.({ userId: this.userId, error }, 'Failed to read thread binding');
      return undefined;
    }
  }

  private async writeBinding(binding: ThreadBinding): Promise<void> {
    try {
      await this.deps.bindings.write(this.userId, binding, this.deps.policy.bindingTtlSeconds);
    } catch (error) {
      this.deps.logger?.warn?.({ userId: this.userId, error }, 'Failed to persist thread binding');
    }
  }

  private async deleteBinding(): Promise<void> {
    try {
      await this.deps.bindings.delete(this.userId);
    } catch (error) {
      this.deps.logger?.warn?.({ userId: this.userId, error }, 'Failed to delete thread binding');
    }
  }

  private async touchBinding(threadId: string): Promise<void> {
    const binding: ThreadBinding = {
      ...(this.binding ?? { threadId, createdAt: this.now() }),
      lastTurnAt: this.now(),
    };
    this.binding = binding;
    await this.writeBinding(binding);
  }
}
