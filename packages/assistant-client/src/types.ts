export type RunStatus =
  | 'Queued'
  | 'InProgress'
  | 'RequiresAction'
  | 'Completed'
  | 'Failed'
  | 'Cancelled'
  | 'Expired';

export const TERMINAL_RUN_STATUSES: readonly RunStatus[] = [
  'Completed',
  'Failed',
  'Cancelled',
  'Expired',
];

export function isTerminalStatus(status: RunStatus): boolean {
  return TERMINAL_RUN_STATUSES.includes(status);
}

export interface RunHandle {
  threadId: string;
  runId: string;
}

/** Tool call the remote run is waiting on while in `RequiresAction`. */
export interface ToolCallRequest {
  id: string;
  name: string;
  /** Raw JSON-encoded arguments exactly as the service sent them. */
  arguments: string;
}

export interface ToolCallResult {
  id: string;
  output: string;
}

export interface RunSnapshot extends RunHandle {
  status: RunStatus;
  toolCalls: ToolCallRequest[];
  lastError?: {
    code?: string;
    message: string;
  };
}

export type FailureKind = 'transient' | 'fatal';

export interface ClientFailure {
  kind: FailureKind;
  message: string;
  status?: number;
  code?: string;
  /** Server-requested delay parsed from `Retry-After`. */
  retryAfterMs?: number;
}

export type ClientResult<T> = { ok: true; value: T } | { ok: false; failure: ClientFailure };

/** Options accepted by every client call. */
export interface RequestOptions {
  /** Aborts the underlying HTTP request, e.g. when the caller's turn deadline passes. */
  signal?: AbortSignal;
}

/** Contract the orchestrator drives; every call resolves to a typed result and never throws. */
export interface AssistantClient {
  createThread(options?: RequestOptions): Promise<ClientResult<string>>;
  postMessage(threadId: string, text: string, options?: RequestOptions): Promise<ClientResult<string>>;
  createRun(threadId: string, options?: RequestOptions): Promise<ClientResult<RunSnapshot>>;
  getRun(run: RunHandle, options?: RequestOptions): Promise<ClientResult<RunSnapshot>>;
  submitToolOutputs(
    run: RunHandle,
    results: ToolCallResult[],
    options?: RequestOptions,
  ): Promise<ClientResult<RunSnapshot>>;
  cancelRun(run: RunHandle, options?: RequestOptions): Promise<ClientResult<RunSnapshot>>;
  getLatestRun(threadId: string, options?: RequestOptions): Promise<ClientResult<RunSnapshot | undefined>>;
  getLatestMessage(
    threadId: string,
    runId?: string,
    options?: RequestOptions,
  ): Promise<ClientResult<string | undefined>>;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  header?(name: string): string | undefined;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export interface HttpRequestInitLike {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type HttpClient = (url: string, init?: HttpRequestInitLike) => Promise<HttpResponseLike>;

export interface AssistantApiClientConfig {
  apiKey: string;
  assistantId: string;
  baseUrl?: string;
  /** Per-request timeout; a timed out request is a transient failure. */
  requestTimeoutMs?: number;
  httpClient?: HttpClient;
}
