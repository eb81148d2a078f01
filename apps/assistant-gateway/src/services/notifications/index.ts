import type { LoggerLike, NotificationSink } from '@assistant-gw/core';

import type { AppConfig } from '../../config/env';

import { LoggingNotificationSink } from './logging-sink';
import { WebhookNotificationSink } from './webhook-sink';

export { LoggingNotificationSink } from './logging-sink';
export { WebhookNotificationSink, type WebhookNotificationSinkOptions } from './webhook-sink';

export function createNotificationSink(config: AppConfig, logger: LoggerLike): NotificationSink {
  const { webhookUrl, webhookToken } = config.notifications;

  if (!webhookUrl) {
    logger.warn?.({}, 'NOTIFICATION_WEBHOOK_URL not configured - notifications will only be logged');
    return new LoggingNotificationSink(logger);
  }

  return new WebhookNotificationSink({ url: webhookUrl, token: webhookToken });
}
