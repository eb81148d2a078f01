import type { SessionRegistry } from '@assistant-gw/core';
import { z } from 'zod';

import type { GatewayFastifyInstance } from '../server/types';

const DEFAULT_TURN_LIMIT = 20;
const MAX_TURN_LIMIT = 200;

const turnsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_TURN_LIMIT).catch(DEFAULT_TURN_LIMIT),
});

export interface AdminRouteContext {
  registry: SessionRegistry;
}

/** Read-only views over resident sessions and recently finished turns. */
export async function registerAdminRoutes(
  app: GatewayFastifyInstance,
  context: AdminRouteContext,
): Promise<void> {
  app.get('/v1/admin/sessions', async () => ({
    residentSessions: context.registry.size,
    sessions: context.registry.summaries(),
  }));

  app.get<{ Querystring: { limit?: string } }>('/v1/admin/turns', async (request) => {
    const { limit } = turnsQuerySchema.parse(request.query ?? {});
    return { turns: context.registry.recentTurns(limit) };
  });
}
