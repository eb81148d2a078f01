import { AssistantApiClient, type AssistantClient } from '@assistant-gw/assistant-client';
import {
  NotificationPublisher,
  SessionRegistry,
  ToolDispatcher,
  createBuiltInRegistry,
  type Clock,
  type NotificationSink,
  type Sleep,
  type ThreadBindingStore,
} from '@assistant-gw/core';

import type { AppConfig } from '../config/env';
import type { AppLogger } from '../telemetry/logger';
import type { GatewayMetrics } from '../telemetry/metrics';

import { createBindingStore } from './bindings';
import { createNotificationSink } from './notifications';

export interface OrchestratorOptions {
  config: AppConfig;
  logger: AppLogger;
  metrics: GatewayMetrics;
  client?: AssistantClient;
  bindings?: ThreadBindingStore;
  sink?: NotificationSink;
  sleep?: Sleep;
  now?: Clock;
}

export interface Orchestrator {
  registry: SessionRegistry;
  bindings: ThreadBindingStore;
  publisher: NotificationPublisher;
}

/**
 * Assemble the conversation orchestrator from configuration: assistant
 * client, tool dispatcher, notification publisher and the session registry,
 * with every lifecycle hook reported to metrics.
 */
export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  const { config, logger, metrics } = options;

  const client =
    options.client ??
    new AssistantApiClient({
      apiKey: config.assistant.apiKey,
      assistantId: config.assistant.assistantId,
      baseUrl: config.assistant.baseUrl,
    });

  const dispatcher = new ToolDispatcher({
    handlers: createBuiltInRegistry(config.tools.enabled),
    critical: config.tools.critical,
    logger,
    onToolCall: ({ tool, status }) => metrics.toolCalls.inc({ tool, status }),
  });

  const publisher = new NotificationPublisher(
    options.sink ?? createNotificationSink(config, logger),
    logger,
    (event) => metrics.notificationFailures.inc({ type: event.type }),
  );

  const bindings = options.bindings ?? createBindingStore(config);

  const registry: SessionRegistry = new SessionRegistry(
    {
      client,
      dispatcher,
      publisher,
      bindings,
      logger,
      sleep: options.sleep,
      now: options.now,
      policy: {
        pollIntervalMs: config.runs.pollIntervalMs,
        maxBackoffMs: config.runs.maxBackoffMs,
        retryBudget: config.runs.retryBudget,
        runTimeoutMs: config.runs.runTimeoutMs,
        replyFormat: config.replyFormat,
        bindingTtlSeconds: config.bindings.ttlSeconds,
      },
      handlers: {
        onStatusChange: ({ from, to }) => metrics.runTransitions.inc({ from, to }),
        onRetry: () => metrics.transientRetries.inc(),
      },
    },
    {
      maxSessions: config.sessions.maxResident,
      historySize: config.sessions.historySize,
      busyPolicy: config.sessions.busyPolicy,
      logger,
      onTurnFinished: (record) => {
        metrics.turnCounter.inc({ outcome: record.outcome });
        metrics.turnDuration.observe(
          { outcome: record.outcome },
          (record.finishedAt - record.startedAt) / 1000,
        );
        metrics.residentSessions.set(registry.size);
      },
      onEvicted: () => metrics.residentSessions.set(registry.size),
    },
  );

  return { registry, bindings, publisher };
}
