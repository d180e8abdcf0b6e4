import type { FetchLike } from '../http_client.js';

export interface StubResponse {
  status?: number;
  body: unknown;
  headers?: Record<string, string>;
}

export interface RecordedRequest {
  url: URL;
  init?: RequestInit;
}

export interface StubFetch {
  fetch: FetchLike;
  requests: RecordedRequest[];
}

/** Answers each request from `handler`; an unhandled URL gets a 404. */
export function stubFetch(handler: (url: URL, init?: RequestInit) => StubResponse | undefined): StubFetch {
  const requests: RecordedRequest[] = [];
  const fetch: FetchLike = async (input, init) => {
    const url = new URL(input);
    requests.push({ url, init });
    const stub = handler(url, init);
    if (!stub) {
      return new Response(JSON.stringify({ error: 'not found' }), { status: 404 });
    }
    const text = typeof stub.body === 'string' ? stub.body : JSON.stringify(stub.body);
    return new Response(text, { status: stub.status ?? 200, headers: stub.headers });
  };
  return { fetch, requests };
}

export function headerOf(request: RecordedRequest | undefined, name: string): string | undefined {
  const headers = request?.init?.headers;
  if (!headers || headers instanceof Headers || Array.isArray(headers)) {
    return undefined;
  }
  const value = headers[name];
  return typeof value === 'string' ? value : undefined;
}
