import type { ToolCallRequest, ToolCallResult } from '@assistant-gw/assistant-client';

import type { LoggerLike } from '../logger';

import {
  isToolName,
  type DispatchContext,
  type DispatchedEffect,
  type DispatchRound,
  type ToolName,
  type ToolOutcome,
  type ToolRegistry,
} from './types';

export type ToolCallStatus = 'success' | 'error' | 'aborted';

export interface ToolDispatcherOptions {
  handlers: ToolRegistry;
  /** Tools whose failure aborts the whole action round instead of reporting an error output. */
  critical?: Iterable<ToolName>;
  logger?: LoggerLike;
  onToolCall?(event: { tool: string; status: ToolCallStatus }): void;
}

/**
 * Resolves the tool calls of one `RequiresAction` pause into exactly one
 * output per call id, in request order.
 */
export class ToolDispatcher {
  private readonly handlers: ToolRegistry;
  private readonly critical: ReadonlySet<ToolName>;
  private readonly logger?: LoggerLike;
  private readonly onToolCall?: ToolDispatcherOptions['onToolCall'];

  constructor(options: ToolDispatcherOptions) {
    this.handlers = { ...options.handlers };
    this.critical = new Set(options.critical ?? []);
    this.logger = options.logger;
    this.onToolCall = options.onToolCall;
  }

  registeredTools(): ToolName[] {
    return Object.keys(this.handlers).filter(isToolName);
  }

  async resolve(context: DispatchContext, requests: ToolCallRequest[]): Promise<DispatchRound> {
    const results: ToolCallResult[] = [];
    const effects: DispatchedEffect[] = [];
    const seen = new Set<string>();

    for (const request of requests) {
      if (seen.has(request.id)) {
        continue;
      }
      seen.add(request.id);

      const tool = request.name;
      const handler = isToolName(tool) ? this.handlers[tool] : undefined;

      if (!isToolName(tool) || !handler) {
        this.logger?.error?.(
          { ...context, callId: request.id, tool },
          'Assistant requested an unknown tool - aborting action round',
        );
        this.onToolCall?.({ tool, status: 'aborted' });
        return {
          ok: false,
          failure: { callId: request.id, tool, message: `Unknown tool "${tool}"` },
        };
      }

      const outcome = await this.invoke(handler, context, request);

      if (!outcome.ok) {
        if (this.critical.has(tool)) {
          this.logger?.error?.(
            { ...context, callId: request.id, tool, error: outcome.error },
            'Critical tool failed - aborting action round',
          );
          this.onToolCall?.({ tool, status: 'aborted' });
          return {
            ok: false,
            failure: { callId: request.id, tool, message: outcome.error },
          };
        }

        this.logger?.warn?.(
          { ...context, callId: request.id, tool, error: outcome.error },
          'Tool call failed - reporting error output to the assistant',
        );
        this.onToolCall?.({ tool, status: 'error' });
        results.push({
          id: request.id,
          output: JSON.stringify({ status: 'error', message: outcome.error }),
        });
        continue;
      }

      this.onToolCall?.({ tool, status: 'success' });
      results.push({ id: request.id, output: serializeOutput(outcome.output) });
      for (const effect of outcome.effects ?? []) {
        effects.push({ ...effect, callId: request.id });
      }
    }

    return { ok: true, results, effects };
  }

  private async invoke(
    handler: NonNullable<ToolRegistry[ToolName]>,
    context: DispatchContext,
    request: ToolCallRequest,
  ): Promise<ToolOutcome> {
    let args: unknown;
    try {
      args = request.arguments.trim() ? JSON.parse(request.arguments) : {};
    } catch (error) {
      return { ok: false, error: `Invalid JSON arguments: ${describeError(error)}` };
    }

    try {
      return await handler({ ...context, callId: request.id, arguments: args });
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
  }
}

function serializeOutput(output: unknown): string {
  if (typeof output === 'string') {
    return output;
  }

  return JSON.stringify(output ?? null);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
