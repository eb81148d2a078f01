import type { ExtractedContact } from '../tools/types';

interface NotificationBase {
  userId: string;
  threadId: string;
  occurredAt: number;
}

export interface ContactCapturedEvent extends NotificationBase {
  type: 'contact_captured';
  runId: string;
  callId: string;
  contact: ExtractedContact;
}

export interface EscalationRequestedEvent extends NotificationBase {
  type: 'escalation_requested';
  runId: string;
  callId: string;
  reason: string;
}

/** Published once, when a user's remote thread is first created. */
export interface ConversationStartedEvent extends NotificationBase {
  type: 'conversation_started';
}

export type NotificationEvent =
  | ContactCapturedEvent
  | EscalationRequestedEvent
  | ConversationStartedEvent;

/** External collaborator receiving orchestrator side-channel events. */
export interface NotificationSink {
  notify(event: NotificationEvent): Promise<void>;
}
