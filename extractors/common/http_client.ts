import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';

export type LmsErrorKind = 'HTTP' | 'TIMEOUT' | 'NETWORK' | 'JSON_PARSE';

export class LmsRequestError extends Error {
  constructor(
    message: string,
    public readonly kind: LmsErrorKind,
    public readonly requestId: string,
    public readonly url: string,
    public readonly statusCode?: number,
    public readonly retryHint?: string,
    public readonly detail?: string,
    public readonly retryAfterSeconds?: number,
  ) {
    super(message);
    this.name = 'LmsRequestError';
  }
}

/** The API answered, but not with the shape this client reads. */
export class UnexpectedPayloadError extends Error {
  constructor(
    message: string,
    public readonly url: string,
  ) {
    super(message);
    this.name = 'UnexpectedPayloadError';
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface JsonRequestOptions {
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export interface JsonResponse {
  requestId: string;
  url: string;
  statusCode: number;
  headers: Headers;
  body: unknown;
  durationMs: number;
}

const DEFAULT_TIMEOUT_MS = 30000;

export async function requestJson(options: JsonRequestOptions): Promise<JsonResponse> {
  const { url } = options;
  const fetchImpl = options.fetchImpl ?? fetch;
  const requestId = randomUUID();
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  const started = performance.now();

  try {
    const response = await fetchImpl(url, {
      method: options.method ?? 'GET',
      headers: {
        accept: 'application/json',
        ...options.headers,
      },
      body: options.body,
      signal: controller.signal,
    });
    const text = await response.text();
    const durationMs = performance.now() - started;

    if (!response.ok) {
      throw new LmsRequestError(
        `Request failed with status ${response.status}`,
        'HTTP',
        requestId,
        url,
        response.status,
        deriveRetryHint(response.status),
        text.slice(0, 400),
        parseRetryAfter(response.headers.get('retry-after')),
      );
    }

    let body: unknown = null;
    if (text.length > 0) {
      try {
        body = JSON.parse(text);
      } catch (error) {
        throw new LmsRequestError(
          'Unable to parse JSON response',
          'JSON_PARSE',
          requestId,
          url,
          response.status,
          'Inspect response payload, JSON parse failed',
          error instanceof Error ? error.message : String(error),
        );
      }
    }

    return { requestId, url, statusCode: response.status, headers: response.headers, body, durationMs };
  } catch (error) {
    if (error instanceof LmsRequestError) {
      throw error;
    }
    if (error instanceof Error && error.name === 'AbortError') {
      throw new LmsRequestError(
        'Request timed out',
        'TIMEOUT',
        requestId,
        url,
        undefined,
        'Request timed out. Increase the timeout or retry later.',
      );
    }
    throw new LmsRequestError(
      'Network error while contacting the LMS API',
      'NETWORK',
      requestId,
      url,
      undefined,
      'Check network connectivity or the API base URL.',
      error instanceof Error ? error.message : String(error),
    );
  } finally {
    clearTimeout(timeoutHandle);
  }
}

export function deriveRetryHint(status: number): string {
  if (status === 429) {
    return 'Hit rate-limit (429). Pause and retry with fewer calls.';
  }
  if (status === 503 || status === 504) {
    return 'Server overloaded. Back off and retry.';
  }
  if (status >= 500) {
    return 'Server error. Retry after a short delay.';
  }
  if (status === 401 || status === 403) {
    return 'Check API credentials and their permissions.';
  }
  if (status >= 400) {
    return 'Verify request parameters before retrying.';
  }
  return 'Retry details unavailable.';
}

export function isTransient(error: unknown): boolean {
  if (!(error instanceof LmsRequestError)) {
    return false;
  }
  if (error.kind === 'TIMEOUT' || error.kind === 'NETWORK') {
    return true;
  }
  if (error.kind === 'HTTP' && error.statusCode !== undefined) {
    return error.statusCode === 429 || error.statusCode >= 500;
  }
  return false;
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = Number.parseFloat(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/** Reads the `rel="next"` target out of an RFC 8288 `Link` header. */
export function nextLinkFromHeader(header: string | null): string | undefined {
  if (!header) return undefined;
  for (const part of header.split(',')) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="?next"?/);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}
