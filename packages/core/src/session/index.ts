export { SessionRegistry, type BusyPolicy, type SessionRegistryOptions } from './registry';
export {
  ConversationSession,
  DEFAULT_RUN_POLICY,
  type RunPolicy,
  type SessionDependencies,
} from './session';
export type {
  AssistantReply,
  SessionSummary,
  TurnError,
  TurnErrorCategory,
  TurnOptions,
  TurnRecord,
  TurnResult,
} from './types';
