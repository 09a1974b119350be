/**
 * Shared test fixtures and constants.
 * Tokens are signed with key pairs generated in-process.
 */

import {
  CompactSign,
  SignJWT,
  exportJWK,
  generateKeyPair,
  type JWK,
  type JWTHeaderParameters,
  type JWTPayload,
  type KeyLike,
} from 'jose';
import type { SigningAlgorithm } from '../types.js';

// ============================================================================
// Time Constants
// ============================================================================

/** Fixed "now" for deterministic expiry checks: 2024-01-01T00:00:00Z */
export const FIXED_NOW_MS = Date.UTC(2024, 0, 1);

export const FIXED_NOW_SECONDS = Math.floor(FIXED_NOW_MS / 1000);

export const ONE_HOUR_SECONDS = 60 * 60;

/** Default minimum key set refresh interval: 15 minutes */
export const REFRESH_INTERVAL_MS = 900 * 1000;

// ============================================================================
// URL Constants
// ============================================================================

export const TEST_ISSUER = 'https://auth.example.com';
export const TEST_JWKS_URI = `${TEST_ISSUER}/.well-known/jwks.json`;

// ============================================================================
// Token Claims
// ============================================================================

export const TEST_SUBJECT = 'user-123';
export const TEST_USERNAME = 'jdoe';
export const TEST_AUDIENCE = 'api.example.com';
export const TEST_KEY_ID = 'key-1';

/**
 * Claims of a token that is valid at FIXED_NOW_MS and passes the default
 * issuer and audience checks.
 */
export const createValidClaims = (overrides: JWTPayload = {}): JWTPayload => ({
  iss: TEST_ISSUER,
  aud: TEST_AUDIENCE,
  sub: TEST_SUBJECT,
  iat: FIXED_NOW_SECONDS - 60,
  exp: FIXED_NOW_SECONDS + ONE_HOUR_SECONDS,
  ...overrides,
});

// ============================================================================
// Keys and tokens
// ============================================================================

export interface TestSigningKey {
  readonly kid: string;
  readonly alg: SigningAlgorithm;
  readonly privateKey: KeyLike;
  /** Public half as it would appear in a key set document */
  readonly publicJwk: JWK;
}

/**
 * Generates a key pair and the matching public JWK.
 */
export const createTestSigningKey = async (
  kid: string = TEST_KEY_ID,
  alg: SigningAlgorithm = 'RS256'
): Promise<TestSigningKey> => {
  const { publicKey, privateKey } = await generateKeyPair(alg);
  const jwk = await exportJWK(publicKey);
  return { kid, alg, privateKey, publicJwk: { ...jwk, kid, alg, use: 'sig' } };
};

/**
 * Builds a key set document from test keys.
 */
export const createKeySetDocument = (
  ...keys: readonly TestSigningKey[]
): { readonly keys: readonly JWK[] } => ({
  keys: keys.map((key) => key.publicJwk),
});

/**
 * Signs a token with a test key. Header fields default to the key's `alg`
 * and `kid`.
 */
export const signTestToken = (
  key: TestSigningKey,
  claims: JWTPayload = createValidClaims(),
  header: Partial<JWTHeaderParameters> = {}
): Promise<string> =>
  new SignJWT(claims).setProtectedHeader({ alg: key.alg, kid: key.kid, ...header }).sign(key.privateKey);

/**
 * Signs an already serialized payload. Used for claim sets that
 * `JSON.stringify` itself cannot produce, such as very deep nesting.
 */
export const signRawPayload = (key: TestSigningKey, payloadJson: string): Promise<string> =>
  new CompactSign(new TextEncoder().encode(payloadJson))
    .setProtectedHeader({ alg: key.alg, kid: key.kid })
    .sign(key.privateKey);

/**
 * JSON text for `{"nested":{"nested":...{"nested":1}...}}` with the given depth.
 */
export const deeplyNestedJson = (depth: number): string =>
  `${'{"nested":'.repeat(depth)}1${'}'.repeat(depth)}`;

/**
 * Base64url-encodes a JSON value, as one segment of a compact token.
 */
export const encodeSegment = (value: unknown): string =>
  Buffer.from(JSON.stringify(value)).toString('base64url');

/**
 * Builds a token with the given header and a dummy payload and signature.
 * Only useful for checks that run before signature verification.
 */
export const createUnsignedToken = (header: unknown): string =>
  `${encodeSegment(header)}.${encodeSegment({ sub: TEST_SUBJECT })}.c2lnbmF0dXJl`;
