import { defaultHttpClient, type HttpClient } from '@assistant-gw/assistant-client';
import type { NotificationEvent, NotificationSink } from '@assistant-gw/core';

import { NotificationDeliveryError } from '../../errors';

export interface WebhookNotificationSinkOptions {
  url: string;
  /** Sent as a bearer token when present. */
  token?: string;
  timeoutMs?: number;
  httpClient?: HttpClient;
}

const DEFAULT_TIMEOUT_MS = 5000;

/** Posts each notification event as JSON to an operator-provided endpoint. */
export class WebhookNotificationSink implements NotificationSink {
  private readonly httpClient: HttpClient;

  constructor(private readonly options: WebhookNotificationSinkOptions) {
    this.httpClient = options.httpClient ?? defaultHttpClient;
  }

  async notify(event: NotificationEvent): Promise<void> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    const response = await this.httpClient(this.options.url, {
      method: 'POST',
      headers,
      body: JSON.stringify(event),
      timeoutMs: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });

    if (!response.ok) {
      throw new NotificationDeliveryError(
        `Notification webhook responded with status ${response.status}`,
        response.status,
      );
    }
  }
}
