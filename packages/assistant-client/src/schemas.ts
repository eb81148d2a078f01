import { z } from 'zod';

import type { RunSnapshot, RunStatus } from './types';

const WIRE_STATUS: Record<string, RunStatus> = {
  queued: 'Queued',
  in_progress: 'InProgress',
  cancelling: 'InProgress',
  requires_action: 'RequiresAction',
  completed: 'Completed',
  incomplete: 'Failed',
  failed: 'Failed',
  cancelled: 'Cancelled',
  expired: 'Expired',
};

export const objectIdSchema = z
  .object({
    id: z.string().min(1),
  })
  .passthrough();

/**
 * Subset of the run object the orchestrator relies on. Unknown fields pass
 * through so new service attributes do not break validation.
 */
export const runSchema = z
  .object({
    id: z.string().min(1),
    thread_id: z.string().min(1),
    status: z.string(),
    required_action: z
      .object({
        type: z.string(),
        submit_tool_outputs: z
          .object({
            tool_calls: z.array(
              z
                .object({
                  id: z.string().min(1),
                  type: z.string().optional(),
                  function: z.object({
                    name: z.string().min(1),
                    arguments: z.string().default('{}'),
                  }),
                })
                .passthrough(),
            ),
          })
          .optional(),
      })
      .passthrough()
      .nullish(),
    last_error: z
      .object({
        code: z.string().optional(),
        message: z.string(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const runListSchema = z
  .object({
    data: z.array(runSchema),
  })
  .passthrough();

export const messageListSchema = z
  .object({
    data: z.array(
      z
        .object({
          id: z.string(),
          role: z.string(),
          run_id: z.string().nullish(),
          content: z.array(
            z
              .object({
                type: z.string(),
                text: z.object({ value: z.string() }).passthrough().optional(),
              })
              .passthrough(),
          ),
        })
        .passthrough(),
    ),
  })
  .passthrough();

export type WireRun = z.infer<typeof runSchema>;
export type WireMessageList = z.infer<typeof messageListSchema>;

export function mapWireStatus(status: string): RunStatus | undefined {
  return WIRE_STATUS[status];
}

/** Translate a validated wire run into the client snapshot, or undefined for unknown statuses. */
export function toRunSnapshot(run: WireRun): RunSnapshot | undefined {
  const status = mapWireStatus(run.status);
  if (!status) {
    return undefined;
  }

  const toolCalls =
    status === 'RequiresAction'
      ? (run.required_action?.submit_tool_outputs?.tool_calls ?? []).map((call) => ({
          id: call.id,
          name: call.function.name,
          arguments: call.function.arguments,
        }))
      : [];

  return {
    runId: run.id,
    threadId: run.thread_id,
    status,
    toolCalls,
    lastError: run.last_error
      ? { code: run.last_error.code, message: run.last_error.message }
      : undefined,
  };
}

/** Join the text parts of the newest assistant message, optionally restricted to one run. */
export function extractAssistantText(list: WireMessageList, runId?: string): string | undefined {
  const message = list.data.find(
    (entry) => entry.role === 'assistant' && (runId === undefined || entry.run_id === runId),
  );

  if (!message) {
    return undefined;
  }

  const parts = message.content
    .map((part) => (part.type === 'text' ? part.text?.value : undefined))
    .filter((value): value is string => typeof value === 'string' && value.length > 0);

  return parts.length > 0 ? parts.join('\n') : undefined;
}
