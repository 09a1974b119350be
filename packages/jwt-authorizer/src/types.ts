import type { KeyLike } from 'jose';
import type { PolicyProgram } from './policy/types.js';

/**
 * Public-key signing algorithms the authorizer is able to verify.
 */
export type SigningAlgorithm =
  | 'ES256'
  | 'ES384'
  | 'RS256'
  | 'RS384'
  | 'RS512'
  | 'PS256'
  | 'PS384'
  | 'PS512'
  | 'EdDSA';

/**
 * Key type families, as advertised by the JWK `kty` member.
 */
export type KeyFamily = 'RSA' | 'EC' | 'OKP';

/**
 * Source of the current time in epoch milliseconds.
 * Injected so that expiry and rate-limit checks can be tested deterministically.
 */
export interface Clock {
  readonly now: () => number;
}

/**
 * Immutable validation policy, built once at process start.
 */
export interface AuthorizerConfig {
  /** URL of the JSON Web Key Set document */
  readonly jwksUri: string;
  /** Accepted `iss` values (empty accepts any issuer) */
  readonly acceptedIssuers: ReadonlySet<string>;
  /** Accepted `aud` values (empty accepts any audience) */
  readonly acceptedAudiences: ReadonlySet<string>;
  /** Accepted signing algorithms (empty accepts every supported algorithm) */
  readonly acceptedAlgorithms: ReadonlySet<SigningAlgorithm>;
  /** Claims consulted, in order, to resolve the principal */
  readonly principalClaims: readonly string[];
  /** Principal used when none of the principal claims is present */
  readonly defaultPrincipal: string;
  /** Minimum time between two key set refreshes */
  readonly minRefreshIntervalMs: number;
  /** Leeway applied to `exp` and `nbf` comparisons */
  readonly clockToleranceSeconds: number;
  /** Compiled policy expression, when one is configured */
  readonly policy: PolicyProgram | undefined;
}

/**
 * Verification key indexed by its key identifier.
 */
export interface KeyRecord {
  readonly keyId: string;
  readonly family: KeyFamily;
  readonly key: KeyLike | Uint8Array;
  /** Algorithm advertised by the JWK `alg` member, if any */
  readonly algorithm?: string;
}

/**
 * Decoded (not yet trusted) JOSE header.
 */
export interface TokenHeader {
  readonly alg: string;
  readonly kid: string;
  readonly [key: string]: unknown;
}

/**
 * Decoded token payload. Recognised registered claims are typed,
 * everything else is carried through as-is.
 */
export interface TokenClaims {
  readonly iss?: string;
  readonly sub?: string;
  readonly aud?: string | readonly string[];
  readonly exp?: number;
  readonly nbf?: number;
  readonly iat?: number;
  readonly jti?: string;
  readonly [key: string]: unknown;
}

/**
 * Reasons a request can be denied. These never reach the caller;
 * they exist for diagnostics.
 */
export type DenialCode =
  | 'MALFORMED_REQUEST'
  | 'UNSUPPORTED_ALGORITHM'
  | 'KEY_NOT_FOUND'
  | 'UPSTREAM_FETCH_FAILED'
  | 'SIGNATURE_INVALID'
  | 'TOKEN_EXPIRED'
  | 'TOKEN_NOT_YET_VALID'
  | 'ISSUER_REJECTED'
  | 'AUDIENCE_REJECTED'
  | 'POLICY_REJECTED'
  | 'INTERNAL_ERROR';

/**
 * Internal error produced by a pipeline stage.
 */
export interface DenialError {
  readonly code: DenialCode;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Token that passed every stage of the pipeline.
 */
export interface AuthorizedToken {
  readonly header: TokenHeader;
  readonly claims: TokenClaims;
  readonly principalId: string;
}

/**
 * Allow decision. The resource is always the wildcard so that a decision
 * cached by principal can be reused across protected resources.
 */
export interface AllowDecision {
  readonly effect: 'Allow';
  readonly resource: '*';
  readonly principalId: string;
  readonly context: Readonly<Record<string, string>>;
}

/**
 * Deny decision. Carries no context.
 */
export interface DenyDecision {
  readonly effect: 'Deny';
}

/**
 * Discriminated union of authorization decisions.
 */
export type Decision = AllowDecision | DenyDecision;
