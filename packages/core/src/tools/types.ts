import type { ToolCallResult } from '@assistant-gw/assistant-client';

export const TOOL_NAMES = ['contact_capture', 'escalate_to_human'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}

/** Contact details extracted by the assistant during a conversation. */
export interface ExtractedContact {
  name?: string;
  phone?: string;
  email?: string;
}

/** Structured side effect a tool call produced, fanned out to notifications. */
export type ToolEffect =
  | { type: 'contact_captured'; contact: ExtractedContact }
  | { type: 'escalation_requested'; reason: string };

export type DispatchedEffect = ToolEffect & { callId: string };

export interface ToolInvocation {
  userId: string;
  threadId: string;
  runId: string;
  callId: string;
  /** JSON-decoded arguments; handlers validate the shape themselves. */
  arguments: unknown;
}

export type ToolOutcome =
  | { ok: true; output: unknown; effects?: ToolEffect[] }
  | { ok: false; error: string };

export type ToolHandler = (invocation: ToolInvocation) => ToolOutcome | Promise<ToolOutcome>;

export type ToolRegistry = Partial<Record<ToolName, ToolHandler>>;

export interface DispatchContext {
  userId: string;
  threadId: string;
  runId: string;
}

export interface ToolRoundFailure {
  callId: string;
  tool: string;
  message: string;
}

export type DispatchRound =
  | { ok: true; results: ToolCallResult[]; effects: DispatchedEffect[] }
  | { ok: false; failure: ToolRoundFailure };
