import type { TurnError, TurnErrorCategory } from '@assistant-gw/core';

const STATUS_BY_CATEGORY: Record<TurnErrorCategory, number> = {
  Busy: 409,
  Timeout: 504,
  RemoteFatal: 502,
  ToolFailure: 502,
};

/** Raised when the turn request body or path parameters fail validation. */
export class InvalidTurnRequestError extends Error {
  readonly statusCode = 400;

  constructor(message = 'Invalid turn request') {
    super(message);
    this.name = 'InvalidTurnRequestError';
  }
}

/** Wraps a turn that the orchestrator finished with a typed failure. */
export class TurnFailedError extends Error {
  readonly statusCode: number;
  readonly category: TurnErrorCategory;

  constructor(public readonly turnError: TurnError) {
    super(turnError.message);
    this.name = 'TurnFailedError';
    this.category = turnError.category;
    this.statusCode = STATUS_BY_CATEGORY[turnError.category];
  }
}

/** Raised by the webhook sink when the receiver does not accept an event. */
export class NotificationDeliveryError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'NotificationDeliveryError';
  }
}
