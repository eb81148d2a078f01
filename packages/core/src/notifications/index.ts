export { NotificationPublisher, type EffectOrigin } from './publisher';
export type {
  ContactCapturedEvent,
  ConversationStartedEvent,
  EscalationRequestedEvent,
  NotificationEvent,
  NotificationSink,
} from './types';
