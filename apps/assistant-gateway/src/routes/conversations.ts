import type { SessionRegistry } from '@assistant-gw/core';

import { TurnFailedError } from '../errors';
import type { GatewayFastifyInstance, RouteRateLimit } from '../server/types';
import type { GatewayMetrics } from '../telemetry/metrics';

import { parseTurnRequest } from './turn-payload-schema';

export interface ConversationRouteContext {
  registry: SessionRegistry;
  metrics: GatewayMetrics;
  /** Deadline for one turn; the orchestrator sees it as an abort signal. */
  turnDeadlineMs: number;
  rateLimit?: RouteRateLimit;
}

/**
 * Register the turn intake route. A successful turn answers with the reply
 * text and any tool side effects; a failed turn is thrown as a
 * {@link TurnFailedError} and rendered by the server's error handler.
 */
export async function registerConversationRoutes(
  app: GatewayFastifyInstance,
  context: ConversationRouteContext,
): Promise<void> {
  app.post<{ Params: { userId: string }; Body: unknown }>(
    '/v1/conversations/:userId/turns',
    {
      config: {
        rateLimit: context.rateLimit,
      },
    },
    async (request, reply) => {
      const stopTimer = context.metrics.requestDuration.startTimer();
      let statusCode = 200;

      try {
        const { userId, text } = parseTurnRequest(request.params, request.body);
        const result = await context.registry.handleTurn(userId, text, {
          signal: AbortSignal.timeout(context.turnDeadlineMs),
        });

        if (!result.ok) {
          request.log.warn(
            { userId, category: result.error.category, threadId: result.error.threadId, runId: result.error.runId },
            'Turn failed',
          );
          throw new TurnFailedError(result.error);
        }

        context.metrics.requestCounter.inc({ method: request.method, status: '200' });
        return reply.code(200).send({
          reply: result.reply.text,
          threadId: result.reply.threadId,
          runId: result.reply.runId,
          turn: result.reply.turn,
          effects: result.reply.effects,
        });
      } catch (error) {
        statusCode = inferStatusCode(error);
        context.metrics.requestCounter.inc({ method: request.method, status: String(statusCode) });
        throw error;
      } finally {
        stopTimer({ method: request.method, status: String(statusCode) });
      }
    },
  );
}

/**
 * Translate known error shapes into HTTP status codes for metric tagging. Any
 * unexpected error falls back to HTTP 500.
 */
function inferStatusCode(error: unknown): number {
  if (error && typeof error === 'object' && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }

  return 500;
}
