import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface GatewayMetrics {
  registry: Registry;
  requestCounter: Counter<string>;
  requestDuration: Histogram<string>;
  turnCounter: Counter<string>;
  turnDuration: Histogram<string>;
  runTransitions: Counter<string>;
  transientRetries: Counter<string>;
  toolCalls: Counter<string>;
  notificationFailures: Counter<string>;
  residentSessions: Gauge<string>;
}

export interface MetricsOptions {
  prefix?: string;
  registry?: Registry;
}

export function createMetrics(options: MetricsOptions = {}): GatewayMetrics {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? 'assistant_gateway_';

  collectDefaultMetrics({ register: registry, prefix });

  const requestCounter = new Counter({
    name: `${prefix}requests_total`,
    help: 'Total number of turn requests processed',
    labelNames: ['method', 'status'],
    registers: [registry],
  });

  const requestDuration = new Histogram({
    name: `${prefix}request_duration_seconds`,
    help: 'Turn request duration in seconds',
    labelNames: ['method', 'status'],
    buckets: [0.5, 1, 2, 5, 10, 30, 60, 90],
    registers: [registry],
  });

  const turnCounter = new Counter({
    name: `${prefix}turns_total`,
    help: 'Conversation turns finished, by outcome',
    labelNames: ['outcome'],
    registers: [registry],
  });

  const turnDuration = new Histogram({
    name: `${prefix}turn_duration_seconds`,
    help: 'Time spent driving a conversation turn, by outcome',
    labelNames: ['outcome'],
    buckets: [0.5, 1, 2, 5, 10, 30, 60],
    registers: [registry],
  });

  const runTransitions = new Counter({
    name: `${prefix}run_status_transitions_total`,
    help: 'Observed remote run status transitions',
    labelNames: ['from', 'to'],
    registers: [registry],
  });

  const transientRetries = new Counter({
    name: `${prefix}transient_retries_total`,
    help: 'Assistant API calls retried after a transient failure',
    registers: [registry],
  });

  const toolCalls = new Counter({
    name: `${prefix}tool_calls_total`,
    help: 'Tool calls resolved for the assistant',
    labelNames: ['tool', 'status'],
    registers: [registry],
  });

  const notificationFailures = new Counter({
    name: `${prefix}notification_failures_total`,
    help: 'Notification events the sink failed to deliver',
    labelNames: ['type'],
    registers: [registry],
  });

  const residentSessions = new Gauge({
    name: `${prefix}resident_sessions`,
    help: 'Conversation sessions currently held in memory',
    registers: [registry],
  });

  return {
    registry,
    requestCounter,
    requestDuration,
    turnCounter,
    turnDuration,
    runTransitions,
    transientRetries,
    toolCalls,
    notificationFailures,
    residentSessions,
  };
}
