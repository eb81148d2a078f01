export { createServer, type ServerOptions } from './create-server';
export type { GatewayFastifyInstance, RouteRateLimit } from './types';
