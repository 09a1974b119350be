/**
 * JWT bearer-token authorizer
 *
 * @packageDocumentation
 */

// Public types
export type * from './types.js';

// ============================================================================
// CORE: Configuration and pipeline
// ============================================================================

export {
  createAuthorizerConfig,
  DEFAULT_MIN_REFRESH_INTERVAL_SECONDS,
  DEFAULT_PRINCIPAL,
  DEFAULT_PRINCIPAL_CLAIMS,
} from './config/authorizer-config.js';
export type {
  AuthorizerConfigOptions,
  ConfigError,
  ConfigErrorCode,
} from './config/authorizer-config.js';

export { createAuthorizer } from './authorizer.js';
export type { Authorizer, AuthorizerDependencies } from './authorizer.js';

export {
  allowDecision,
  denyDecision,
  buildContext,
  CLAIM_CONTEXT_PREFIX,
  CLAIMS_CONTEXT_KEY,
  PRINCIPAL_CONTEXT_KEY,
} from './decision.js';
export { resolvePrincipal } from './principal.js';

// ============================================================================
// CORE: Key store
// ============================================================================

export { createKeyStore, parseKeySet } from './cache/index.js';
export type {
  KeyStore,
  KeyStoreOptions,
  KeyStoreSnapshot,
  ParsedKeySet,
  SkippedKey,
} from './cache/index.js';

// ============================================================================
// CORE: Policy expressions
// ============================================================================

export { compilePolicy, MAX_NESTING_DEPTH } from './policy/index.js';
export type { PolicyError, PolicyInput, PolicyProgram, PolicyValue } from './policy/index.js';

// ============================================================================
// ADVANCED: Individual pipeline stages
// ============================================================================

export {
  extractBearerToken,
  decodeTokenHeader,
  checkAlgorithm,
  isSupportedAlgorithm,
  SUPPORTED_ALGORITHMS,
  verifyToken,
  checkIssuer,
  checkAudience,
  createDenial,
} from './validation/index.js';
export type { VerifyOptions } from './validation/index.js';

// ============================================================================
// ADVANCED: Custom HTTP client / clock / logger
// ============================================================================

export { createFetchClient } from './http/index.js';
export type {
  HttpClient,
  HttpClientOptions,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './http/index.js';

export { systemClock } from './clock.js';
export { createSilentLogger } from './logger.js';
export type { Logger } from './logger.js';
