import type { LoggerLike, NotificationEvent, NotificationSink } from '@assistant-gw/core';

/** Fallback sink used when no webhook is configured: events only reach the log. */
export class LoggingNotificationSink implements NotificationSink {
  constructor(private readonly logger: LoggerLike) {}

  async notify(event: NotificationEvent): Promise<void> {
    this.logger.info?.({ event }, 'Notification event (no webhook configured)');
  }
}
