import type { z } from 'zod';

import {
  extractAssistantText,
  messageListSchema,
  objectIdSchema,
  runListSchema,
  runSchema,
  toRunSnapshot,
  type WireRun,
} from './schemas';
import type {
  AssistantApiClientConfig,
  AssistantClient,
  ClientFailure,
  ClientResult,
  FailureKind,
  HttpClient,
  HttpRequestInitLike,
  HttpResponseLike,
  RunHandle,
  RequestOptions,
  RunSnapshot,
  ToolCallResult,
} from './types';

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const TRANSIENT_STATUSES = new Set([408, 409, 425, 429]);

/**
 * HTTP adapter over the hosted assistant service's thread, message and run
 * endpoints. Every failure is classified as transient or fatal here; callers
 * receive typed results instead of exceptions.
 */
export class AssistantApiClient implements AssistantClient {
  private readonly apiKey: string;
  private readonly assistantId: string;
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly httpClient: HttpClient;

  constructor(config: AssistantApiClientConfig) {
    if (!config?.apiKey) {
      throw new Error('AssistantApiClient requires an apiKey.');
    }

    if (!config.assistantId) {
      throw new Error('AssistantApiClient requires an assistantId.');
    }

    this.apiKey = config.apiKey;
    this.assistantId = config.assistantId;
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, '');
    this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.httpClient = config.httpClient ?? defaultHttpClient;
  }

  async createThread(options: RequestOptions = {}): Promise<ClientResult<string>> {
    const result = await this.request('POST', '/threads', objectIdSchema, { ...options, body: {} });
    return result.ok ? { ok: true, value: result.value.id } : result;
  }

  async postMessage(threadId: string, text: string, options: RequestOptions = {}): Promise<ClientResult<string>> {
    const result = await this.request(
      'POST',
      `/threads/${encodeURIComponent(threadId)}/messages`,
      objectIdSchema,
      { ...options, body: { role: 'user', content: text } },
    );
    return result.ok ? { ok: true, value: result.value.id } : result;
  }

  async createRun(threadId: string, options: RequestOptions = {}): Promise<ClientResult<RunSnapshot>> {
    const result = await this.request(
      'POST',
      `/threads/${encodeURIComponent(threadId)}/runs`,
      runSchema,
      { ...options, body: { assistant_id: this.assistantId } },
    );
    return this.toSnapshotResult(result);
  }

  async getRun(run: RunHandle, options: RequestOptions = {}): Promise<ClientResult<RunSnapshot>> {
    const result = await this.request('GET', runPath(run), runSchema, options);
    return this.toSnapshotResult(result);
  }

  async submitToolOutputs(
    run: RunHandle,
    results: ToolCallResult[],
    options: RequestOptions = {},
  ): Promise<ClientResult<RunSnapshot>> {
    const result = await this.request('POST', `${runPath(run)}/submit_tool_outputs`, runSchema, {
      ...options,
      body: { tool_outputs: results.map((entry) => ({ tool_call_id: entry.id, output: entry.output })) },
    });
    return this.toSnapshotResult(result);
  }

  async cancelRun(run: RunHandle, options: RequestOptions = {}): Promise<ClientResult<RunSnapshot>> {
    const result = await this.request('POST', `${runPath(run)}/cancel`, runSchema, { ...options, body: {} });
    return this.toSnapshotResult(result);
  }

  async getLatestRun(
    threadId: string,
    options: RequestOptions = {},
  ): Promise<ClientResult<RunSnapshot | undefined>> {
    const result = await this.request(
      'GET',
      `/threads/${encodeURIComponent(threadId)}/runs?order=desc&limit=1`,
      runListSchema,
      options,
    );

    if (!result.ok) {
      return result;
    }

    const [latest] = result.value.data;
    if (!latest) {
      return { ok: true, value: undefined };
    }

    return this.toSnapshotResult({ ok: true, value: latest });
  }

  async getLatestMessage(
    threadId: string,
    runId?: string,
    options: RequestOptions = {},
  ): Promise<ClientResult<string | undefined>> {
    const result = await this.request(
      'GET',
      `/threads/${encodeURIComponent(threadId)}/messages?order=desc&limit=20`,
      messageListSchema,
      options,
    );

    if (!result.ok) {
      return result;
    }

    return { ok: true, value: extractAssistantText(result.value, runId) };
  }

  private toSnapshotResult(result: ClientResult<WireRun>): ClientResult<RunSnapshot> {
    if (!result.ok) {
      return result;
    }

    const snapshot = toRunSnapshot(result.value);
    if (!snapshot) {
      return failure('fatal', `Unknown run status "${result.value.status}"`);
    }

    return { ok: true, value: snapshot };
  }

  private async request<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    path: string,
    schema: S,
    { body, signal }: RequestOptions & { body?: unknown } = {},
  ): Promise<ClientResult<z.output<S>>> {
    const init: HttpRequestInitLike = {
      method,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
        'OpenAI-Beta': 'assistants=v2',
      },
      timeoutMs: this.requestTimeoutMs,
      signal,
    };

    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    let response: HttpResponseLike;
    try {
      response = await this.httpClient(`${this.baseUrl}${path}`, init);
    } catch (error) {
      if (signal?.aborted) {
        return failure('transient', 'Assistant API request was cancelled');
      }
      const message = error instanceof Error ? error.message : String(error);
      return failure('transient', `Assistant API request failed: ${message}`);
    }

    if (!response.ok) {
      return { ok: false, failure: await describeApiFailure(response) };
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      return failure('fatal', 'Assistant API returned a non-JSON response body.', response.status);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return failure(
        'fatal',
        `Unexpected Assistant API response: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim(),
        response.status,
      );
    }

    return { ok: true, value: parsed.data };
  }
}

/** Map an HTTP status to the retry classification consumed by the run poller. */
export function classifyStatus(status: number): FailureKind {
  if (TRANSIENT_STATUSES.has(status) || status >= 500) {
    return 'transient';
  }

  return 'fatal';
}

/** Parse a `Retry-After` header given either in seconds or as an HTTP date. */
export function parseRetryAfter(value: string | undefined, now = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) {
    return undefined;
  }

  return Math.max(0, date - now);
}

async function describeApiFailure(response: HttpResponseLike): Promise<ClientFailure> {
  const kind = classifyStatus(response.status);
  let message = `Assistant API request failed with status ${response.status}.`;
  let code: string | undefined;

  try {
    const errorPayload = extractErrorPayload(await response.json());
    if (errorPayload?.message) {
      message = errorPayload.message;
    }
    code = errorPayload?.code;
  } catch {
    const fallbackText = await safeReadText(response);
    if (fallbackText) {
      message = `${message} ${fallbackText.slice(0, 200)}`;
    }
  }

  return {
    kind,
    message,
    status: response.status,
    code,
    retryAfterMs: kind === 'transient' ? parseRetryAfter(response.header?.('retry-after')) : undefined,
  };
}

function extractErrorPayload(body: unknown): { message?: string; code?: string } | null {
  if (!body || typeof body !== 'object' || !('error' in body)) {
    return null;
  }

  const candidate = body.error;
  if (!candidate || typeof candidate !== 'object') {
    return null;
  }

  const message = 'message' in candidate && typeof candidate.message === 'string' ? candidate.message : undefined;
  const code = 'code' in candidate && typeof candidate.code === 'string' ? candidate.code : undefined;
  return { message, code };
}

function failure(kind: FailureKind, message: string, status?: number): { ok: false; failure: ClientFailure } {
  return { ok: false, failure: { kind, message, status } };
}

function runPath(run: RunHandle): string {
  return `/threads/${encodeURIComponent(run.threadId)}/runs/${encodeURIComponent(run.runId)}`;
}

async function safeReadText(response: HttpResponseLike): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

function combineSignals(...candidates: Array<AbortSignal | undefined>): AbortSignal | undefined {
  const signals = candidates.filter((signal): signal is AbortSignal => signal !== undefined);
  if (signals.length <= 1) {
    return signals[0];
  }
  return AbortSignal.any(signals);
}

export const defaultHttpClient: HttpClient = async (url, init?: HttpRequestInitLike) => {
  const response = await fetch(url, {
    method: init?.method,
    headers: init?.headers,
    body: init?.body,
    signal: combineSignals(init?.signal, init?.timeoutMs ? AbortSignal.timeout(init.timeoutMs) : undefined),
  });

  const textClone = response.clone();

  return {
    ok: response.ok,
    status: response.status,
    header: (name) => response.headers.get(name) ?? undefined,
    json: () => response.json(),
    text: () => textClone.text(),
  };
};
