import type { GatewayFastifyInstance } from '../server/types';

/** Register simple health/liveness endpoints (currently `/healthz`). */
export async function registerHealthRoutes(app: GatewayFastifyInstance): Promise<void> {
  app.get('/healthz', async () => ({ status: 'ok' }));
}
