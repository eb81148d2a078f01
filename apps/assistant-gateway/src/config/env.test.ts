import { describe, expect, it } from 'vitest';

import { loadConfig } from './env';

const required = {
  NODE_ENV: 'test',
  ASSISTANT_API_KEY: 'test-key',
  ASSISTANT_ID: 'asst_test',
};

describe('loadConfig', () => {
  it('applies defaults for every optional setting', () => {
    expect(loadConfig(required)).toEqual({
      env: 'test',
      port: 8080,
      logLevel: undefined,
      assistant: { apiKey: 'test-key', assistantId: 'asst_test', baseUrl: undefined },
      runs: {
        pollIntervalMs: 1000,
        maxBackoffMs: 8000,
        runTimeoutMs: 60_000,
        retryBudget: 5,
        turnDeadlineMs: 90_000,
      },
      sessions: { maxResident: 1000, historySize: 200, busyPolicy: 'reject' },
      tools: { enabled: ['contact_capture', 'escalate_to_human'], critical: [] },
      replyFormat: 'plain',
      notifications: { webhookUrl: undefined, webhookToken: undefined },
      bindings: { driver: 'memory', redisUrl: undefined, ttlSeconds: 2_592_000 },
      rateLimit: { max: 60, timeWindow: '1 minute' },
    });
  });

  it('parses tool lists and case-insensitive enums', () => {
    const config = loadConfig({
      ...required,
      ENABLED_TOOLS: 'contact_capture, escalate_to_human',
      CRITICAL_TOOLS: 'contact_capture',
      TURN_BUSY_POLICY: 'QUEUE',
      REPLY_FORMAT: 'Html',
      BINDING_STORE_DRIVER: 'redis',
      REDIS_URL: 'redis://localhost:6379',
      BINDING_TTL_SECONDS: '3600',
    });

    expect(config.tools).toEqual({
      enabled: ['contact_capture', 'escalate_to_human'],
      critical: ['contact_capture'],
    });
    expect(config.sessions.busyPolicy).toBe('queue');
    expect(config.replyFormat).toBe('html');
    expect(config.bindings).toEqual({ driver: 'redis', redisUrl: 'redis://localhost:6379', ttlSeconds: 3600 });
  });

  it('allows disabling every tool', () => {
    expect(loadConfig({ ...required, ENABLED_TOOLS: '' }).tools.enabled).toEqual([]);
  });

  it('requires the assistant credentials', () => {
    expect(() => loadConfig({ NODE_ENV: 'test', ASSISTANT_ID: 'asst_test' })).toThrow(
      'ASSISTANT_API_KEY is required',
    );
  });

  it('rejects unknown tool names', () => {
    expect(() => loadConfig({ ...required, ENABLED_TOOLS: 'lookup_weather' })).toThrow(/Invalid enum value/);
  });

  it('rejects critical tools that are not enabled', () => {
    expect(() =>
      loadConfig({ ...required, ENABLED_TOOLS: 'contact_capture', CRITICAL_TOOLS: 'escalate_to_human' }),
    ).toThrow('CRITICAL_TOOLS must be enabled first: escalate_to_human');
  });

  it('rejects malformed numeric settings', () => {
    expect(() => loadConfig({ ...required, RUN_TIMEOUT_MS: 'soon' })).toThrow(
      'Invalid RUN_TIMEOUT_MS value: soon',
    );
  });

  it('requires a Redis URL for the redis driver', () => {
    expect(() => loadConfig({ ...required, BINDING_STORE_DRIVER: 'redis' })).toThrow(
      'BINDING_STORE_DRIVER=redis requires REDIS_URL environment variable',
    );
  });
});
