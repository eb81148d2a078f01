import type { LoggerLike } from '../logger';
import type { DispatchedEffect } from '../tools/types';

import type { NotificationEvent, NotificationSink } from './types';

export interface EffectOrigin {
  userId: string;
  threadId: string;
  runId: string;
}

/**
 * Fire-and-forget wrapper around a {@link NotificationSink}. Deliveries are
 * started without being awaited, so a slow or failing sink never holds up or
 * fails the user-facing turn. Failures are logged and reported.
 */
export class NotificationPublisher {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly sink: NotificationSink,
    private readonly logger: LoggerLike = {},
    private readonly onFailure?: (event: NotificationEvent, error: unknown) => void,
  ) {}

  /** Number of deliveries that have not settled yet. */
  get inFlight(): number {
    return this.pending.size;
  }

  publish(event: NotificationEvent): void {
    const delivery = this.deliver(event).finally(() => {
      this.pending.delete(delivery);
    });
    this.pending.add(delivery);
  }

  publishEffects(effects: DispatchedEffect[], origin: EffectOrigin, now = Date.now()): void {
    for (const effect of effects) {
      this.publish(toEvent(effect, origin, now));
    }
  }

  /** Resolves once every delivery started so far has settled. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private async deliver(event: NotificationEvent): Promise<void> {
    try {
      await this.sink.notify(event);
    } catch (error) {
      this.logger.warn?.(
        { error, type: event.type, userId: event.userId, threadId: event.threadId },
        'Failed to deliver notification',
      );
      this.onFailure?.(event, error);
    }
  }
}

function toEvent(effect: DispatchedEffect, origin: EffectOrigin, occurredAt: number): NotificationEvent {
  switch (effect.type) {
    case 'contact_captured':
      return { ...origin, occurredAt, type: 'contact_captured', callId: effect.callId, contact: effect.contact };
    case 'escalation_requested':
      return { ...origin, occurredAt, type: 'escalation_requested', callId: effect.callId, reason: effect.reason };
  }
}
