import type { AssistantClient } from '@assistant-gw/assistant-client';
import type { NotificationPublisher, NotificationSink, ThreadBindingStore } from '@assistant-gw/core';

import { loadConfig, type AppConfig } from './config/env';
import { createServer, type GatewayFastifyInstance } from './server';
import { RedisThreadBindingStore } from './services/bindings';
import { createOrchestrator } from './services/orchestrator';
import { createLogger, type AppLogger } from './telemetry/logger';
import { createMetrics, type GatewayMetrics } from './telemetry/metrics';

export interface Application {
  config: AppConfig;
  logger: AppLogger;
  metrics: GatewayMetrics;
  server: GatewayFastifyInstance;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface ApplicationOverrides {
  env?: NodeJS.ProcessEnv;
  logger?: AppLogger;
  client?: AssistantClient;
  bindings?: ThreadBindingStore;
  sink?: NotificationSink;
}

/**
 * Compose the gateway by wiring configuration loading, logging/metrics, the
 * thread binding store, the conversation orchestrator and the Fastify server.
 * The returned object exposes lifecycle helpers used by the CLI entrypoint and
 * integration tests.
 */
export async function createApplication(overrides: ApplicationOverrides = {}): Promise<Application> {
  const config = loadConfig(overrides.env);
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });
  const metrics = createMetrics();

  const { registry, bindings, publisher } = createOrchestrator({
    config,
    logger,
    metrics,
    client: overrides.client,
    bindings: overrides.bindings,
    sink: overrides.sink,
  });

  const server = await createServer({ config, logger, metrics, registry });

  return {
    config,
    logger,
    metrics,
    server,
    start: () => startServer(server, config),
    stop: () => stopServer(server, publisher, bindings, logger),
  };
}

/** Listen on all interfaces so container deployments can reach the server. */
async function startServer(server: GatewayFastifyInstance, config: AppConfig): Promise<void> {
  await server.listen({ port: config.port, host: '0.0.0.0' });
}

/**
 * Shut down the HTTP server, let notification deliveries already started
 * finish, and close any Redis client connection. A failed Redis close is
 * logged and otherwise ignored.
 */
async function stopServer(
  server: GatewayFastifyInstance,
  publisher: NotificationPublisher,
  bindings: ThreadBindingStore,
  logger: AppLogger,
): Promise<void> {
  await server.close();
  await publisher.flush();

  if (bindings instanceof RedisThreadBindingStore) {
    try {
      await bindings.close();
    } catch (error) {
      logger.warn({ error }, 'Failed to gracefully close Redis binding store');
    }
  }
}
