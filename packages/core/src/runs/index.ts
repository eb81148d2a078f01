export {
  RunPoller,
  type PollContext,
  type RunFailureCategory,
  type RunLifecycleHandlers,
  type RunOutcome,
  type RunPollerDependencies,
  type SettleOutcome,
} from './poller';
export {
  callWithRetry,
  computeBackoff,
  defaultSleep,
  pause,
  type Clock,
  type RetryContext,
  type RetryEvent,
  type RetryOutcome,
  type RetrySchedule,
  type Sleep,
} from './retry';
