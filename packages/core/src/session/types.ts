import type { RunHandle, RunStatus } from '@assistant-gw/assistant-client';

import type { DispatchedEffect } from '../tools/types';

export type TurnErrorCategory = 'Busy' | 'Timeout' | 'RemoteFatal' | 'ToolFailure';

export interface TurnError {
  category: TurnErrorCategory;
  message: string;
  turn?: number;
  threadId?: string;
  runId?: string;
  runStatus?: RunStatus;
}

export interface AssistantReply {
  text: string;
  threadId: string;
  runId: string;
  turn: number;
  /** Structured side effects produced by tool calls during the turn. */
  effects: DispatchedEffect[];
}

export type TurnResult = { ok: true; reply: AssistantReply } | { ok: false; error: TurnError };

export interface TurnOptions {
  /** External deadline; aborting releases the session and orphans any live run. */
  signal?: AbortSignal;
}

/** Read-only view of a session for the admin surface. */
export interface SessionSummary {
  userId: string;
  threadId?: string;
  activeRun?: RunHandle;
  orphanedRun?: RunHandle;
  turnSequence: number;
  busy: boolean;
  lastActiveAt: number;
}

export interface TurnRecord {
  userId: string;
  turn?: number;
  threadId?: string;
  runId?: string;
  startedAt: number;
  finishedAt: number;
  outcome: 'ok' | TurnErrorCategory;
  message?: string;
}
