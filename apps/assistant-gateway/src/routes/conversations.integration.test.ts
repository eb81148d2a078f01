import { AssistantApiClient, type HttpClient, type HttpResponseLike } from '@assistant-gw/assistant-client';
import {
  InMemoryThreadBindingStore,
  type NotificationEvent,
  type NotificationSink,
  type ThreadBinding,
} from '@assistant-gw/core';
import { afterEach, describe, expect, it } from 'vitest';

import { loadConfig, type AppConfig } from '../config/env';
import { createServer, type GatewayFastifyInstance } from '../server';
import { createOrchestrator } from '../services/orchestrator';
import { createLogger } from '../telemetry/logger';
import { createMetrics, type GatewayMetrics } from '../telemetry/metrics';

const START = 1_700_000_000_000;

function jsonResponse(status: number, body: unknown): HttpResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    header: () => undefined,
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

interface WireRunStep {
  status: string;
  required_action?: unknown;
}

/** In-process stand-in for the hosted assistant API. */
class FakeAssistantApi {
  readonly runSteps: WireRunStep[] = [];
  readonly submissions: unknown[] = [];
  defaultRunStatus = 'completed';
  reply = 'Hello! How can I help?';
  threadFailure?: { status: number; body: unknown };
  onGetRun?: () => Promise<void>;

  private threads = 0;
  private messages = 0;
  private runs = 0;
  private lastCompletedRun?: string;

  readonly handle: HttpClient = async (url, init) => {
    const { pathname } = new URL(url);
    const method = init?.method ?? 'GET';

    if (method === 'POST' && pathname === '/v1/threads') {
      if (this.threadFailure) {
        return jsonResponse(this.threadFailure.status, this.threadFailure.body);
      }
      this.threads += 1;
      return jsonResponse(200, { id: `thread_${this.threads}`, object: 'thread' });
    }

    if (/^\/v1\/threads\/[^/]+\/messages$/.test(pathname)) {
      if (method === 'POST') {
        this.messages += 1;
        return jsonResponse(200, { id: `msg_${this.messages}` });
      }
      return jsonResponse(200, {
        data: [
          {
            id: 'msg_reply',
            role: 'assistant',
            run_id: this.lastCompletedRun,
            content: [{ type: 'text', text: { value: this.reply, annotations: [] } }],
          },
        ],
      });
    }

    const runs = /^\/v1\/threads\/([^/]+)\/runs$/.exec(pathname);
    if (runs) {
      if (method === 'POST') {
        this.runs += 1;
        return jsonResponse(200, { id: `run_${this.runs}`, thread_id: runs[1], status: 'queued' });
      }
      return jsonResponse(200, { data: [] });
    }

    const run = /^\/v1\/threads\/([^/]+)\/runs\/([^/]+)(\/submit_tool_outputs|\/cancel)?$/.exec(pathname);
    if (run) {
      const [, threadId, runId, action] = run;
      if (action === '/submit_tool_outputs') {
        this.submissions.push(JSON.parse(init?.body ?? '{}'));
        return jsonResponse(200, { id: runId, thread_id: threadId, status: 'queued' });
      }
      if (action === '/cancel') {
        return jsonResponse(200, { id: runId, thread_id: threadId, status: 'cancelling' });
      }

      await this.onGetRun?.();
      const step = this.runSteps.shift() ?? { status: this.defaultRunStatus };
      if (step.status === 'completed') {
        this.lastCompletedRun = runId;
      }
      return jsonResponse(200, { id: runId, thread_id: threadId, ...step });
    }

    return jsonResponse(404, { error: { message: `No route for ${method} ${pathname}` } });
  };
}

class RecordingSink implements NotificationSink {
  readonly events: NotificationEvent[] = [];

  async notify(event: NotificationEvent): Promise<void> {
    this.events.push(event);
  }
}

class RecordingBindingStore extends InMemoryThreadBindingStore {
  readonly ttls: Array<number | undefined> = [];

  override async write(userId: string, binding: ThreadBinding, ttlSeconds?: number): Promise<void> {
    this.ttls.push(ttlSeconds);
    await super.write(userId, binding, ttlSeconds);
  }
}

function createTestConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    ASSISTANT_API_KEY: 'test-key',
    ASSISTANT_ID: 'asst_test',
    RATE_LIMIT_MAX: '100',
    ...env,
  });
}

interface TestContext {
  server: GatewayFastifyInstance;
  api: FakeAssistantApi;
  sink: RecordingSink;
  metrics: GatewayMetrics;
  bindings: RecordingBindingStore;
}

describe('conversation routes', () => {
  let server: GatewayFastifyInstance | undefined;

  afterEach(async () => {
    if (server) {
      await server.close();
      server = undefined;
    }
  });

  async function setup(env: NodeJS.ProcessEnv = {}): Promise<TestContext> {
    const config = createTestConfig(env);
    const api = new FakeAssistantApi();
    const sink = new RecordingSink();
    const logger = createLogger({ level: 'silent' });
    const metrics = createMetrics();
    const bindings = new RecordingBindingStore();
    let clock = START;

    const { registry } = createOrchestrator({
      config,
      logger,
      metrics,
      client: new AssistantApiClient({ apiKey: 'test-key', assistantId: 'asst_test', httpClient: api.handle }),
      bindings,
      sink,
      sleep: async (ms) => {
        clock += ms;
      },
      now: () => clock,
    });

    server = await createServer({ config, logger, metrics, registry });
    return { server, api, sink, metrics, bindings };
  }

  it('runs a turn and returns the assistant reply', async () => {
    const { server: app, metrics } = await setup();

    const response = await app.inject({
      method: 'POST',
      url: '/v1/conversations/user-1/turns',
      payload: { text: 'hello' },
      headers: { 'x-request-id': 'req-42' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['x-request-id']).toBe('req-42');
    expect(response.json()).toEqual({
      reply: 'Hello! How can I help?',
      threadId: 'thread_1',
      runId: 'run_1',
      turn: 1,
      effects: [],
    });

    const turns = await metrics.turnCounter.get();
    expect(turns.values).toMatchObject([{ value: 1, labels: { outcome: 'ok' } }]);
  });

  it('stores thread bindings with the configured ttl', async () => {
    const { server: app, bindings } = await setup({ BINDING_TTL_SECONDS: '3600' });

    await app.inject({ method: 'POST', url: '/v1/conversations/user-1/turns', payload: { text: 'hello' } });

    expect(bindings.ttls).toEqual([3600, 3600]);
    await expect(bindings.read('user-1')).resolves.toEqual({
      threadId: 'thread_1',
      createdAt: START,
      lastTurnAt: START,
    });
  });

  it('resolves tool calls and forwards captured contacts', async () => {
    const { server: app, api, sink } = await setup();
    api.runSteps.push({
      status: 'requires_action',
      required_action: {
        type: 'submit_tool_outputs',
        submit_tool_outputs: {
          tool_calls: [
            {
              id: 'call_1',
              type: 'function',
              function: { name: 'contact_capture', arguments: JSON.stringify({ phone: '+1 555 0100' }) },
            },
          ],
        },
      },
    });
    api.reply = 'Thanks! A manager will call you.';

    const response = await app.inject({
      method: 'POST',
      url: '/v1/conversations/user-1/turns',
      payload: { text: 'Call me at +1 555 0100' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      reply: 'Thanks! A manager will call you.',
      threadId: 'thread_1',
      runId: 'run_1',
      turn: 1,
      effects: [{ type: 'contact_captured', callId: 'call_1', contact: { phone: '+15550100' } }],
    });
    expect(api.submissions).toEqual([
      {
        tool_outputs: [
          {
            tool_call_id: 'call_1',
            output: JSON.stringify({
              status: 'success',
              message: 'Contact information saved and notification sent',
            }),
          },
        ],
      },
    ]);
    expect(sink.events.map((event) => event.type)).toEqual(['conversation_started', 'contact_captured']);
  });

  it('rejects an empty message with HTTP 400', async () => {
    const { server: app } = await setup();

    const response = await app.inject({
      method: 'POST',
      url: '/v1/conversations/user-1/turns',
      payload: { text: '   ' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      statusCode: 400,
      error: 'Bad Request',
      message: 'Invalid turn request: text must not be empty',
    });
  });

  it('maps authentication failures to HTTP 502', async () => {
    const { server: app, api } = await setup();
    api.threadFailure = {
      status: 401,
      body: { error: { message: 'Incorrect API key provided', code: 'invalid_api_key' } },
    };

    const response = await app.inject({
      method: 'POST',
      url: '/v1/conversations/user-1/turns',
      payload: { text: 'hello' },
    });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({
      statusCode: 502,
      error: 'RemoteFatal',
      message: 'Incorrect API key provided',
    });
  });

  it('maps an exhausted run budget to HTTP 504', async () => {
    const { server: app, api } = await setup({ RUN_TIMEOUT_MS: '10000' });
    api.defaultRunStatus = 'in_progress';

    const response = await app.inject({
      method: 'POST',
      url: '/v1/conversations/user-1/turns',
      payload: { text: 'hello' },
    });

    expect(response.statusCode).toBe(504);
    expect(response.json()).toEqual({
      statusCode: 504,
      error: 'Timeout',
      message: 'Run exceeded its wall-clock budget',
      threadId: 'thread_1',
      runId: 'run_1',
    });
  });

  it('answers HTTP 409 while the same user has a turn in flight', async () => {
    const { server: app, api } = await setup();
    let markReached: () => void = () => undefined;
    let release: () => void = () => undefined;
    const reached = new Promise<void>((resolve) => {
      markReached = resolve;
    });
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    api.onGetRun = async () => {
      markReached();
      await gate;
    };

    const first = app
      .inject({ method: 'POST', url: '/v1/conversations/user-1/turns', payload: { text: 'first' } })
      .then((response) => response);
    await reached;

    const second = await app.inject({
      method: 'POST',
      url: '/v1/conversations/user-1/turns',
      payload: { text: 'second' },
    });

    expect(second.statusCode).toBe(409);
    expect(second.json()).toEqual({
      statusCode: 409,
      error: 'Busy',
      message: 'A previous turn is still being processed for this user',
      threadId: 'thread_1',
      runId: 'run_1',
    });

    release();
    expect((await first).statusCode).toBe(200);
  });

  it('exposes resident sessions and recent turns', async () => {
    const { server: app } = await setup();
    await app.inject({ method: 'POST', url: '/v1/conversations/user-1/turns', payload: { text: 'hello' } });

    const sessions = await app.inject({ method: 'GET', url: '/v1/admin/sessions' });
    const turns = await app.inject({ method: 'GET', url: '/v1/admin/turns?limit=5' });

    expect(sessions.json()).toEqual({
      residentSessions: 1,
      sessions: [
        {
          userId: 'user-1',
          threadId: 'thread_1',
          turnSequence: 1,
          busy: false,
          lastActiveAt: START,
        },
      ],
    });
    expect(turns.json()).toEqual({
      turns: [
        {
          userId: 'user-1',
          turn: 1,
          threadId: 'thread_1',
          runId: 'run_1',
          startedAt: START,
          finishedAt: START,
          outcome: 'ok',
        },
      ],
    });
  });

  it('serves health and metrics endpoints', async () => {
    const { server: app } = await setup();

    const health = await app.inject({ method: 'GET', url: '/healthz' });
    const metrics = await app.inject({ method: 'GET', url: '/metrics' });

    expect(health.json()).toEqual({ status: 'ok' });
    expect(metrics.statusCode).toBe(200);
    expect(metrics.body).toContain('# TYPE assistant_gateway_turns_total counter');
  });
});
