import {
  DEFAULT_BINDING_TTL_SECONDS,
  TOOL_NAMES,
  type BusyPolicy,
  type ReplyFormat,
  type ToolName,
} from '@assistant-gw/core';
import { z } from 'zod';

function positiveInt(name: string, fallback: number) {
  return z
    .string()
    .optional()
    .transform((value) => {
      if (!value) {
        return fallback;
      }
      const parsed = Number.parseInt(value, 10);
      if (Number.isNaN(parsed) || parsed <= 0) {
        throw new Error(`Invalid ${name} value: ${value}`);
      }
      return parsed;
    });
}

function toolList(fallback: readonly ToolName[]) {
  return z
    .string()
    .optional()
    .transform((value) =>
      value === undefined
        ? [...fallback]
        : value
            .split(',')
            .map((entry) => entry.trim())
            .filter(Boolean),
    )
    .pipe(z.array(z.enum(TOOL_NAMES)));
}

/**
 * Environment contract for the gateway. Assistant credentials are required;
 * every tuning knob has a default.
 */
const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default(process.env.NODE_ENV === 'production' ? 'production' : 'development'),
  PORT: z
    .string()
    .optional()
    .transform((value) => {
      if (!value) {
        return 8080;
      }
      const parsed = Number.parseInt(value, 10);
      if (Number.isNaN(parsed)) {
        throw new Error(`Invalid PORT value: ${value}`);
      }
      return parsed;
    }),
  LOG_LEVEL: z.string().optional(),
  ASSISTANT_API_KEY: z.string({ required_error: 'ASSISTANT_API_KEY is required' }).min(1, 'ASSISTANT_API_KEY is required'),
  ASSISTANT_ID: z.string({ required_error: 'ASSISTANT_ID is required' }).min(1, 'ASSISTANT_ID is required'),
  ASSISTANT_API_BASE_URL: z.string().url('ASSISTANT_API_BASE_URL must be a valid URL').optional(),
  RUN_POLL_INTERVAL_MS: positiveInt('RUN_POLL_INTERVAL_MS', 1000),
  RUN_MAX_BACKOFF_MS: positiveInt('RUN_MAX_BACKOFF_MS', 8000),
  RUN_TIMEOUT_MS: positiveInt('RUN_TIMEOUT_MS', 60_000),
  RUN_RETRY_BUDGET: positiveInt('RUN_RETRY_BUDGET', 5),
  TURN_DEADLINE_MS: positiveInt('TURN_DEADLINE_MS', 90_000),
  MAX_RESIDENT_SESSIONS: positiveInt('MAX_RESIDENT_SESSIONS', 1000),
  TURN_HISTORY_SIZE: positiveInt('TURN_HISTORY_SIZE', 200),
  TURN_BUSY_POLICY: z
    .string()
    .optional()
    .transform((value) => (value ? value.toLowerCase() : 'reject'))
    .pipe(z.enum(['reject', 'queue'])),
  ENABLED_TOOLS: toolList(TOOL_NAMES),
  CRITICAL_TOOLS: toolList([]),
  REPLY_FORMAT: z
    .string()
    .optional()
    .transform((value) => (value ? value.toLowerCase() : 'plain'))
    .pipe(z.enum(['plain', 'html'])),
  NOTIFICATION_WEBHOOK_URL: z.string().url('NOTIFICATION_WEBHOOK_URL must be a valid URL').optional(),
  NOTIFICATION_WEBHOOK_TOKEN: z.string().min(1).optional(),
  BINDING_STORE_DRIVER: z
    .string()
    .optional()
    .transform((value) => (value ? value.toLowerCase() : 'memory'))
    .pipe(z.enum(['memory', 'redis'])),
  REDIS_URL: z.string().url('REDIS_URL must be a valid URL').optional(),
  BINDING_TTL_SECONDS: positiveInt('BINDING_TTL_SECONDS', DEFAULT_BINDING_TTL_SECONDS),
  RATE_LIMIT_MAX: positiveInt('RATE_LIMIT_MAX', 60),
  RATE_LIMIT_WINDOW: z
    .string()
    .optional()
    .transform((value) => value ?? '1 minute'),
});

export type BindingStoreDriver = z.infer<typeof envSchema>['BINDING_STORE_DRIVER'];

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  logLevel?: string;
  assistant: {
    apiKey: string;
    assistantId: string;
    baseUrl?: string;
  };
  runs: {
    pollIntervalMs: number;
    maxBackoffMs: number;
    runTimeoutMs: number;
    retryBudget: number;
    /** Deadline for a whole HTTP turn, including thread setup and reconciliation. */
    turnDeadlineMs: number;
  };
  sessions: {
    maxResident: number;
    historySize: number;
    busyPolicy: BusyPolicy;
  };
  tools: {
    enabled: ToolName[];
    critical: ToolName[];
  };
  replyFormat: ReplyFormat;
  notifications: {
    webhookUrl?: string;
    webhookToken?: string;
  };
  bindings: {
    driver: BindingStoreDriver;
    redisUrl?: string;
    /** How long a user's thread binding outlives their last turn. */
    ttlSeconds: number;
  };
  rateLimit: {
    max: number;
    timeWindow: string;
  };
}

/**
 * Parse and validate configuration from the provided environment source,
 * throwing the first validation message when a variable is missing or
 * malformed.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const firstError = result.error.issues[0];
    throw new Error(firstError?.message ?? 'Invalid environment configuration');
  }

  const env = result.data;

  const unknownCritical = env.CRITICAL_TOOLS.filter((tool) => !env.ENABLED_TOOLS.includes(tool));
  if (unknownCritical.length > 0) {
    throw new Error(`CRITICAL_TOOLS must be enabled first: ${unknownCritical.join(', ')}`);
  }

  if (env.BINDING_STORE_DRIVER === 'redis' && !env.REDIS_URL) {
    throw new Error('BINDING_STORE_DRIVER=redis requires REDIS_URL environment variable');
  }

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    assistant: {
      apiKey: env.ASSISTANT_API_KEY,
      assistantId: env.ASSISTANT_ID,
      baseUrl: env.ASSISTANT_API_BASE_URL,
    },
    runs: {
      pollIntervalMs: env.RUN_POLL_INTERVAL_MS,
      maxBackoffMs: env.RUN_MAX_BACKOFF_MS,
      runTimeoutMs: env.RUN_TIMEOUT_MS,
      retryBudget: env.RUN_RETRY_BUDGET,
      turnDeadlineMs: env.TURN_DEADLINE_MS,
    },
    sessions: {
      maxResident: env.MAX_RESIDENT_SESSIONS,
      historySize: env.TURN_HISTORY_SIZE,
      busyPolicy: env.TURN_BUSY_POLICY,
    },
    tools: {
      enabled: env.ENABLED_TOOLS,
      critical: env.CRITICAL_TOOLS,
    },
    replyFormat: env.REPLY_FORMAT,
    notifications: {
      webhookUrl: env.NOTIFICATION_WEBHOOK_URL,
      webhookToken: env.NOTIFICATION_WEBHOOK_TOKEN,
    },
    bindings: {
      driver: env.BINDING_STORE_DRIVER,
      redisUrl: env.REDIS_URL,
      ttlSeconds: env.BINDING_TTL_SECONDS,
    },
    rateLimit: {
      max: env.RATE_LIMIT_MAX,
      timeWindow: env.RATE_LIMIT_WINDOW,
    },
  };
}
