import type { HttpClient, HttpResponseLike } from '@assistant-gw/assistant-client';
import type { NotificationEvent } from '@assistant-gw/core';
import { describe, expect, it, vi } from 'vitest';

import { NotificationDeliveryError } from '../../errors';

import { LoggingNotificationSink } from './logging-sink';
import { WebhookNotificationSink } from './webhook-sink';

const event: NotificationEvent = {
  type: 'escalation_requested',
  userId: 'user-1',
  threadId: 'thread_1',
  runId: 'run_1',
  callId: 'call_1',
  reason: 'Wants a refund',
  occurredAt: 1_700_000_000_000,
};

function response(status: number): HttpResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => ({}),
    text: async () => '',
  };
}

describe('WebhookNotificationSink', () => {
  it('posts the event as JSON with a bearer token', async () => {
    const httpClient = vi.fn<Parameters<HttpClient>, ReturnType<HttpClient>>().mockResolvedValue(response(204));
    const sink = new WebhookNotificationSink({
      url: 'https://hooks.example.com/notify',
      token: 'test-token',
      httpClient,
    });

    await sink.notify(event);

    expect(httpClient).toHaveBeenCalledWith('https://hooks.example.com/notify', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-token' },
      body: JSON.stringify(event),
      timeoutMs: 5000,
    });
  });

  it('omits the authorization header without a token', async () => {
    const httpClient = vi.fn<Parameters<HttpClient>, ReturnType<HttpClient>>().mockResolvedValue(response(200));
    const sink = new WebhookNotificationSink({ url: 'https://hooks.example.com/notify', httpClient });

    await sink.notify(event);

    expect(httpClient.mock.calls[0]?.[1]?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('rejects when the receiver answers with an error status', async () => {
    const sink = new WebhookNotificationSink({
      url: 'https://hooks.example.com/notify',
      httpClient: async () => response(500),
    });

    const delivery = sink.notify(event);

    await expect(delivery).rejects.toBeInstanceOf(NotificationDeliveryError);
    await expect(delivery).rejects.toThrow('Notification webhook responded with status 500');
  });
});

describe('LoggingNotificationSink', () => {
  it('logs the event', async () => {
    const info = vi.fn();
    const sink = new LoggingNotificationSink({ info });

    await sink.notify(event);

    expect(info).toHaveBeenCalledWith({ event }, 'Notification event (no webhook configured)');
  });
});
