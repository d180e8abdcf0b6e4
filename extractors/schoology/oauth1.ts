import { createHmac, randomBytes } from 'node:crypto';

export interface OAuth1Credentials {
  consumerKey: string;
  consumerSecret: string;
}

export interface OAuth1Nonce {
  nonce: string;
  /** Seconds since the epoch. */
  timestamp: number;
}

export function createNonce(): OAuth1Nonce {
  return { nonce: randomBytes(16).toString('hex'), timestamp: Math.floor(Date.now() / 1000) };
}

/** RFC 3986 percent-encoding as OAuth 1.0a requires it. */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
}

function protocolParams(credentials: OAuth1Credentials, nonce: OAuth1Nonce): Array<[string, string]> {
  return [
    ['oauth_consumer_key', credentials.consumerKey],
    ['oauth_nonce', nonce.nonce],
    ['oauth_signature_method', 'HMAC-SHA1'],
    ['oauth_timestamp', String(nonce.timestamp)],
    ['oauth_version', '1.0'],
  ];
}

export function signatureBaseString(
  method: string,
  url: string,
  credentials: OAuth1Credentials,
  nonce: OAuth1Nonce,
): string {
  const parsed = new URL(url);
  const pairs = [...protocolParams(credentials, nonce), ...parsed.searchParams.entries()]
    .map(([key, value]): [string, string] => [percentEncode(key), percentEncode(value)])
    .sort(([keyA, valueA], [keyB, valueB]) => (keyA === keyB ? compare(valueA, valueB) : compare(keyA, keyB)));
  const normalized = pairs.map(([key, value]) => `${key}=${value}`).join('&');
  const baseUrl = `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  return [method.toUpperCase(), percentEncode(baseUrl), percentEncode(normalized)].join('&');
}

/**
 * Two-legged OAuth 1.0a `Authorization` header (HMAC-SHA1, no token). Query parameters of
 * `url` take part in the signature.
 */
export function buildAuthorizationHeader(
  method: string,
  url: string,
  credentials: OAuth1Credentials,
  nonce: OAuth1Nonce = createNonce(),
): string {
  const baseString = signatureBaseString(method, url, credentials, nonce);
  const signature = createHmac('sha1', `${percentEncode(credentials.consumerSecret)}&`)
    .update(baseString)
    .digest('base64');
  const params = [...protocolParams(credentials, nonce), ['oauth_signature', signature]];
  return `OAuth ${params.map(([key, value]) => `${percentEncode(key)}="${percentEncode(value)}"`).join(', ')}`;
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
