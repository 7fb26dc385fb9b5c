/**
 * @fileoverview fetch wrapper for the token and backend calls
 *
 * Every request gets an AbortController-based timeout and, optionally, the
 * caller's signal. Failures come back as the flow's own error kinds.
 */

import {
  FlowCancelledError,
  FlowPhase,
  NetworkError,
  TimeoutError,
  TokenExchangeError
} from '../errors/authErrors.js';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * Default timeout for provider/backend requests (10 seconds)
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

export interface JsonRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string | URLSearchParams;
  phase: FlowPhase;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** User-facing text when this request times out */
  timeoutMessage?: string;
  fetchImpl?: FetchLike;
}

export interface JsonResponse {
  status: number;
  ok: boolean;
  body: unknown;
  /** Raw body text, kept for diagnostics when it is not JSON */
  text: string;
}

/** OAuth error codes that mean starting over may work */
const RETRYABLE_ERROR_CODES = new Set(['invalid_grant', 'temporarily_unavailable', 'slow_down']);

/** OAuth error codes that point at the client registration */
const CLIENT_ERROR_CODES = new Set([
  'invalid_client',
  'unauthorized_client',
  'redirect_uri_mismatch',
  'invalid_scope',
  'unsupported_grant_type'
]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Perform a request and parse a JSON body if there is one
 */
export async function requestJson(url: string, options: JsonRequestOptions): Promise<JsonResponse> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const fetchImpl = options.fetchImpl ?? fetch;

  // Set up abort controller for timeout and caller cancellation
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onCallerAbort = (): void => controller.abort();

  if (options.signal?.aborted) {
    clearTimeout(timeout);
    throw new FlowCancelledError(`Request cancelled before ${options.phase}`);
  }
  options.signal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    const response = await fetchImpl(url, {
      method: options.method ?? 'GET',
      headers: { Accept: 'application/json', ...options.headers },
      body: options.body,
      signal: controller.signal
    });
    const text = await response.text();

    let body: unknown = undefined;
    if (text !== '') {
      try {
        body = JSON.parse(text);
      } catch {
        body = undefined;
      }
    }

    return { status: response.status, ok: response.ok, body, text };
  } catch (error) {
    if (timedOut) {
      throw new TimeoutError(
        `Request for ${options.phase} timed out after ${timeoutMs}ms`,
        options.phase,
        timeoutMs,
        options.timeoutMessage
      );
    }
    if (options.signal?.aborted) {
      throw new FlowCancelledError(`Request for ${options.phase} was cancelled`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new NetworkError(`Request for ${options.phase} failed: ${message}`, options.phase, { cause: error });
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener('abort', onCallerAbort);
  }
}

export interface DeadlineOptions {
  phase: FlowPhase;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Settle with the operation, or reject with TimeoutError / FlowCancelledError
 * when the timeout fires or the signal aborts first. For clients that take no signal.
 */
export async function withDeadline<T>(operation: () => Promise<T>, options: DeadlineOptions): Promise<T> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  if (options.signal?.aborted) {
    throw new FlowCancelledError(`Request cancelled before ${options.phase}`);
  }

  let rejectDeadline: (error: Error) => void = () => undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    rejectDeadline = reject;
  });
  const timeout = setTimeout(() => {
    rejectDeadline(new TimeoutError(`Request for ${options.phase} timed out after ${timeoutMs}ms`, options.phase, timeoutMs));
  }, timeoutMs);
  const onAbort = (): void => rejectDeadline(new FlowCancelledError(`Request for ${options.phase} was cancelled`));
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    return await Promise.race([operation(), deadline]);
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Build a TokenExchangeError from a non-2xx response.
 * Only the error code and description are kept; the body may echo secrets.
 */
export function exchangeErrorFromResponse(response: JsonResponse, phase: FlowPhase, what: string): TokenExchangeError {
  const body = isRecord(response.body) ? response.body : {};
  // Backends sometimes nest the OAuth error: { error: { message, status } }
  const errorValue = body.error;
  const errorCode = typeof errorValue === 'string'
    ? errorValue
    : isRecord(errorValue) ? readString(errorValue, 'status') ?? readString(errorValue, 'message') : undefined;
  const errorDescription = readString(body, 'error_description') ?? readString(body, 'message');

  let retryable: boolean;
  if (errorCode && CLIENT_ERROR_CODES.has(errorCode)) {
    retryable = false;
  } else if (errorCode && RETRYABLE_ERROR_CODES.has(errorCode)) {
    retryable = true;
  } else if (response.status === 401 || response.status === 403) {
    retryable = false;
  } else {
    retryable = response.status >= 500 || response.status === 429 || response.status === 400;
  }

  return new TokenExchangeError(
    `${what} failed: HTTP ${response.status}${errorCode ? ` (${errorCode})` : ''}`,
    { phase, status: response.status, errorCode, errorDescription, retryable }
  );
}
