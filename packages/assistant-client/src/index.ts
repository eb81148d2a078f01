export { AssistantApiClient, classifyStatus, defaultHttpClient, parseRetryAfter } from './client';
export { extractAssistantText, mapWireStatus, toRunSnapshot } from './schemas';
export { TERMINAL_RUN_STATUSES, isTerminalStatus } from './types';
export type {
  AssistantApiClientConfig,
  AssistantClient,
  ClientFailure,
  ClientResult,
  FailureKind,
  HttpClient,
  HttpRequestInitLike,
  HttpResponseLike,
  RequestOptions,
  RunHandle,
  RunSnapshot,
  RunStatus,
  ToolCallRequest,
  ToolCallResult,
} from './types';
