import type { LoggerLike } from '../logger';

import { ConversationSession, type SessionDependencies } from './session';
import type { SessionSummary, TurnOptions, TurnRecord, TurnResult } from './types';

export type BusyPolicy = 'reject' | 'queue';

export interface SessionRegistryOptions {
  /** Resident sessions kept before idle ones are evicted, least recently used first. */
  maxSessions: number;
  /** Turn records retained for the admin surface. */
  historySize?: number;
  /** `reject` answers concurrent turns with `Busy`; `queue` waits for the user's previous turn. */
  busyPolicy?: BusyPolicy;
  logger?: LoggerLike;
  onTurnFinished?(record: TurnRecord): void;
  onEvicted?(userId: string): void;
}

const DEFAULT_HISTORY_SIZE = 200;

/**
 * Process-wide map from user id to conversation session. Lookups and inserts
 * are synchronous, so no registry state is held across a network call; each
 * session serializes its own remote work.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, ConversationSession>();
  private readonly userLocks = new Map<string, Promise<void>>();
  private readonly history: TurnRecord[] = [];
  private readonly historySize: number;
  private readonly busyPolicy: BusyPolicy;

  constructor(
    private readonly deps: SessionDependencies,
    private readonly options: SessionRegistryOptions,
  ) {
    if (!Number.isInteger(options.maxSessions) || options.maxSessions <= 0) {
      throw new Error('SessionRegistry requires a positive maxSessions.');
    }

    this.historySize = options.historySize ?? DEFAULT_HISTORY_SIZE;
    this.busyPolicy = options.busyPolicy ?? 'reject';
  }

  get size(): number {
    return this.sessions.size;
  }

  getOrCreate(userId: string): ConversationSession {
    const existing = this.sessions.get(userId);
    if (existing) {
      // Re-insert to mark as most recently used.
      this.sessions.delete(userId);
      this.sessions.set(userId, existing);
      return existing;
    }

    const session = new ConversationSession(userId, this.deps);
    this.sessions.set(userId, session);
    this.evictOverflow(userId);
    return session;
  }

  /** Drop an idle session's local state. Busy sessions are never evicted. */
  evict(userId: string): boolean {
    const session = this.sessions.get(userId);
    if (!session || session.busy) {
      return false;
    }

    this.sessions.delete(userId);
    this.options.logger?.debug?.({ userId }, 'Evicted conversation session');
    this.options.onEvicted?.(userId);
    return true;
  }

  async handleTurn(userId: string, text: string, options: TurnOptions = {}): Promise<TurnResult> {
    if (this.busyPolicy === 'queue') {
      return this.withUserLock(userId, () => this.runTurn(userId, text, options));
    }

    return this.runTurn(userId, text, options);
  }

  summaries(): SessionSummary[] {
    return [...this.sessions.values()].map((session) => session.summary());
  }

  /** Most recent turns first. */
  recentTurns(limit = 20): TurnRecord[] {
    return this.history.slice(-limit).reverse();
  }

  private async runTurn(userId: string, text: string, options: TurnOptions): Promise<TurnResult> {
    const now = this.deps.now ?? Date.now;
    const startedAt = now();
    const session = this.getOrCreate(userId);
    const result = await session.handleTurn(text, options);

    const record: TurnRecord = result.ok
      ? {
          userId,
          turn: result.reply.turn,
          threadId: result.reply.threadId,
          runId: result.reply.runId,
          startedAt,
          finishedAt: now(),
          outcome: 'ok',
        }
      : {
          userId,
          turn: result.error.turn,
          threadId: result.error.threadId,
          runId: result.error.runId,
          startedAt,
          finishedAt: now(),
          outcome: result.error.category,
          message: result.error.message,
        };

    this.record(record);
    return result;
  }

  private record(record: TurnRecord): void {
    this.history.push(record);
    if (this.history.length > this.historySize) {
      this.history.splice(0, this.history.length - this.historySize);
    }
    this.options.onTurnFinished?.(record);
  }

  private evictOverflow(keep: string): void {
    if (this.sessions.size <= this.options.maxSessions) {
      return;
    }

    for (const [userId, session] of this.sessions) {
      if (this.sessions.size <= this.options.maxSessions) {
        return;
      }
      if (userId === keep || session.busy) {
        continue;
      }
      this.evict(userId);
    }
  }

  /**
   * Run the task while holding an exclusive per-user lock so queued turns for
   * the same user execute one after another. Other users are unaffected.
   */
  private async withUserLock<T>(userId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.userLocks.get(userId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const chain = previous.then(() => current);
    this.userLocks.set(userId, chain);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.userLocks.get(userId) === chain) {
        this.userLocks.delete(userId);
      }
    }
  }
}
