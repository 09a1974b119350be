/**
 * Shared helpers for the function tests: a signing key, a key set served by
 * an in-memory HTTP client, and a logger that records into memory.
 */

import { ok, type Result } from 'neverthrow';
import { SignJWT, exportJWK, generateKeyPair, type JWTPayload, type KeyLike } from 'jose';
import { pino, type Logger } from 'pino';
import type { HttpClient, HttpError, HttpRequest, HttpResponse } from 'jwt-authorizer';

export const FIXED_NOW_MS = Date.UTC(2024, 0, 1);
export const FIXED_NOW_SECONDS = Math.floor(FIXED_NOW_MS / 1000);

export const TEST_ISSUER = 'https://auth.example.com';
export const TEST_JWKS_URI = `${TEST_ISSUER}/.well-known/jwks.json`;
export const TEST_AUDIENCE = 'api.example.com';
export const TEST_KEY_ID = 'key-1';
export const TEST_METHOD_ARN = 'arn:aws:execute-api:us-east-1:123456789012:abc123/prod/GET/orders';

export interface SigningKey {
  readonly privateKey: KeyLike;
  readonly publicJwk: Record<string, unknown>;
}

export const createSigningKey = async (): Promise<SigningKey> => {
  const { publicKey, privateKey } = await generateKeyPair('RS256');
  const jwk = await exportJWK(publicKey);
  return { privateKey, publicJwk: { ...jwk, kid: TEST_KEY_ID, alg: 'RS256', use: 'sig' } };
};

export const signToken = (key: SigningKey, claims: JWTPayload): Promise<string> =>
  new SignJWT(claims)
    .setProtectedHeader({ alg: 'RS256', kid: TEST_KEY_ID, typ: 'JWT' })
    .sign(key.privateKey);

export const validClaims = (overrides: JWTPayload = {}): JWTPayload => ({
  iss: TEST_ISSUER,
  aud: TEST_AUDIENCE,
  sub: 'user-123',
  iat: FIXED_NOW_SECONDS - 60,
  exp: FIXED_NOW_SECONDS + 3600,
  ...overrides,
});

export interface RecordingHttpClient extends HttpClient {
  readonly requests: readonly HttpRequest[];
}

/**
 * HTTP client that serves one key set document for every request.
 */
export const createKeySetClient = (...keys: readonly SigningKey[]): RecordingHttpClient => {
  const requests: HttpRequest[] = [];
  const response: Result<HttpResponse<unknown>, HttpError> = ok({
    status: 200,
    statusText: 'OK',
    body: { keys: keys.map((key) => key.publicJwk) },
  });
  return {
    requests,
    getJson: (request) => {
      requests.push(request);
      return Promise.resolve(response);
    },
  };
};

export const fixedClock = { now: (): number => FIXED_NOW_MS };

export interface CapturedLogs {
  readonly logger: Logger;
  readonly lines: readonly string[];
}

export const captureLogs = (): CapturedLogs => {
  const lines: string[] = [];
  const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });
  return { logger, lines };
};
