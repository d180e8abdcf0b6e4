import { createSign } from 'node:crypto';
import fs from 'node:fs';

import { z } from 'zod';

import { UnexpectedPayloadError, requestJson, type FetchLike } from '../common/http_client.js';

export const CLASSROOM_SCOPES = [
  'https://www.googleapis.com/auth/classroom.courses.readonly',
  'https://www.googleapis.com/auth/classroom.rosters.readonly',
  'https://www.googleapis.com/auth/classroom.profile.emails',
  'https://www.googleapis.com/auth/classroom.coursework.students.readonly',
  'https://www.googleapis.com/auth/admin.reports.usage.readonly',
];

const serviceAccountSchema = z.object({
  client_email: z.string().email(),
  private_key: z.string().min(1),
  token_uri: z.string().url().default('https://oauth2.googleapis.com/token'),
});

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().int().positive().default(3600),
});

export type ServiceAccountCredentials = z.output<typeof serviceAccountSchema>;

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

export interface ServiceAccountAuthOptions {
  credentials: ServiceAccountCredentials;
  /** Workspace user the service account acts for (domain-wide delegation). */
  subject: string;
  scopes?: string[];
  fetchImpl?: FetchLike;
  now?: () => number;
}

// refresh this long before the token's stated expiry
const EXPIRY_MARGIN_MS = 60000;

export function loadServiceAccount(file: string): ServiceAccountCredentials {
  return serviceAccountSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
}

export function parseServiceAccount(value: unknown): ServiceAccountCredentials {
  return serviceAccountSchema.parse(value);
}

/** OAuth 2.0 JWT-bearer grant for a Google service account. */
export class ServiceAccountAuth implements AccessTokenProvider {
  private cached?: { token: string; expiresAt: number };

  constructor(private readonly options: ServiceAccountAuthOptions) {}

  async getAccessToken(): Promise<string> {
    const now = this.now();
    if (this.cached && this.cached.expiresAt - EXPIRY_MARGIN_MS > now) {
      return this.cached.token;
    }

    const { token_uri: tokenUri } = this.options.credentials;
    const response = await requestJson({
      url: tokenUri,
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
        assertion: this.createAssertion(now),
      }).toString(),
      fetchImpl: this.options.fetchImpl,
    });
    const parsed = tokenResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new UnexpectedPayloadError('Token endpoint did not return an access token', tokenUri);
    }

    this.cached = { token: parsed.data.access_token, expiresAt: now + parsed.data.expires_in * 1000 };
    return parsed.data.access_token;
  }

  createAssertion(nowMs: number = this.now()): string {
    const { credentials } = this.options;
    const issuedAt = Math.floor(nowMs / 1000);
    const header = encodeSegment({ alg: 'RS256', typ: 'JWT' });
    const claims = encodeSegment({
      iss: credentials.client_email,
      sub: this.options.subject,
      scope: (this.options.scopes ?? CLASSROOM_SCOPES).join(' '),
      aud: credentials.token_uri,
      iat: issuedAt,
      exp: issuedAt + 3600,
    });
    const signature = createSign('RSA-SHA256').update(`${header}.${claims}`).sign(credentials.private_key);
    return `${header}.${claims}.${signature.toString('base64url')}`;
  }

  private now(): number {
    return this.options.now ? this.options.now() : Date.now();
  }
}

function encodeSegment(value: Record<string, unknown>): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}
