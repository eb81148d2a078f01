import { STATUS_CODES } from 'node:http';

import helmet from '@fastify/helmet';
import fastifyRateLimit from '@fastify/rate-limit';
import type { SessionRegistry } from '@assistant-gw/core';
import Fastify from 'fastify';

import type { AppConfig } from '../config/env';
import { TurnFailedError } from '../errors';
import { registerAdminRoutes } from '../routes/admin';
import { registerConversationRoutes } from '../routes/conversations';
import { registerHealthRoutes } from '../routes/health';
import type { AppLogger } from '../telemetry/logger';
import type { GatewayMetrics } from '../telemetry/metrics';

import type { GatewayFastifyInstance } from './types';

export interface ServerOptions {
  config: AppConfig;
  logger: AppLogger;
  metrics: GatewayMetrics;
  registry: SessionRegistry;
}

/**
 * Build and configure the Fastify HTTP server exposing the turn intake route,
 * the admin views, health checks, metrics, and the operational middleware
 * (helmet, rate limiting, correlation IDs).
 */
export async function createServer(options: ServerOptions): Promise<GatewayFastifyInstance> {
  const { config, metrics, registry } = options;
  const rateLimit = { max: config.rateLimit.max, timeWindow: config.rateLimit.timeWindow };

  const app: GatewayFastifyInstance = Fastify({
    logger: options.logger,
    disableRequestLogging: config.env === 'production',
  });

  await app.register(helmet, {
    global: true,
  });

  await app.register(fastifyRateLimit, {
    global: false,
    ...rateLimit,
  });

  app.addHook('onRequest', (request, reply, done) => {
    const correlationId =
      firstHeader(request.headers['x-request-id']) ??
      firstHeader(request.headers['x-correlation-id']) ??
      request.id;

    void reply.header('x-request-id', correlationId);
    request.headers['x-correlation-id'] = correlationId;
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    request.log.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        requestId: reply.getHeader('x-request-id'),
      },
      'Request completed',
    );
    done();
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof TurnFailedError) {
      return reply.code(error.statusCode).send({
        statusCode: error.statusCode,
        error: error.category,
        message: error.message,
        threadId: error.turnError.threadId,
        runId: error.turnError.runId,
      });
    }

    const statusCode = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    if (statusCode >= 500) {
      request.log.error({ error }, 'Unhandled request error');
    }

    return reply.code(statusCode).send({
      statusCode,
      error: STATUS_CODES[statusCode] ?? 'Error',
      message: statusCode >= 500 ? 'Internal Server Error' : error.message,
    });
  });

  await registerHealthRoutes(app);
  await registerConversationRoutes(app, {
    registry,
    metrics,
    turnDeadlineMs: config.runs.turnDeadlineMs,
    rateLimit,
  });
  await registerAdminRoutes(app, { registry });

  app.get('/metrics', async (_, reply) => {
    const payload = await metrics.registry.metrics();
    return reply.type(metrics.registry.contentType).send(payload);
  });

  return app;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const header = Array.isArray(value) ? value[0] : value;
  return header || undefined;
}
