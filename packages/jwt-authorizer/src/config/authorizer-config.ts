import { ok, err, type Result } from 'neverthrow';
import type { AuthorizerConfig, SigningAlgorithm } from '../types.js';
import type { PolicyProgram } from '../policy/types.js';
import { compilePolicy } from '../policy/compile.js';
import { isSupportedAlgorithm } from '../validation/algorithms.js';

/** Claims consulted for the principal when none are configured */
export const DEFAULT_PRINCIPAL_CLAIMS: readonly string[] = ['preferred_username', 'sub'];

export const DEFAULT_PRINCIPAL = 'unknown';

/** 15 minutes */
export const DEFAULT_MIN_REFRESH_INTERVAL_SECONDS = 900;

/**
 * Raw configuration values, typically read from the environment.
 */
export interface AuthorizerConfigOptions {
  /** URL of the JSON Web Key Set document (http or https) */
  readonly jwksUri: string;
  readonly acceptedIssuers?: Iterable<string> | undefined;
  readonly acceptedAudiences?: Iterable<string> | undefined;
  /** Algorithm names; each must be a supported signing algorithm */
  readonly acceptedAlgorithms?: Iterable<string> | undefined;
  /** Principal claims in priority order (default: preferred_username, sub) */
  readonly principalClaims?: readonly string[] | undefined;
  /** Principal used when no principal claim is present (default: "unknown") */
  readonly defaultPrincipal?: string | undefined;
  /** Minimum seconds between key set refreshes (default: 900) */
  readonly minRefreshIntervalSeconds?: number | undefined;
  /** Leeway for `exp` and `nbf` in seconds (default: 0) */
  readonly clockToleranceSeconds?: number | undefined;
  /** Policy expression; unset or blank disables the policy stage */
  readonly policyExpression?: string | undefined;
}

export type ConfigErrorCode =
  | 'INVALID_JWKS_URI'
  | 'UNSUPPORTED_ALGORITHM'
  | 'INVALID_NUMBER'
  | 'INVALID_POLICY';

/**
 * Startup failure. The authorizer must not serve requests with a config that
 * produced one of these.
 */
export interface ConfigError {
  readonly code: ConfigErrorCode;
  /** Option that failed validation */
  readonly field: keyof AuthorizerConfigOptions;
  readonly message: string;
  readonly cause?: unknown;
}

const validateJwksUri = (value: string): Result<string, ConfigError> => {
  const invalid = (message: string): Result<string, ConfigError> =>
    err({ code: 'INVALID_JWKS_URI', field: 'jwksUri', message });

  if (value.trim() === '') {
    return invalid('Key set URL is required');
  }
  if (!URL.canParse(value)) {
    return invalid(`Key set URL '${value}' is not a valid URL`);
  }
  const { protocol } = new URL(value);
  if (protocol !== 'https:' && protocol !== 'http:') {
    return invalid(`Key set URL must use http or https, got '${protocol}'`);
  }
  return ok(value);
};

const validateAlgorithms = (
  values: Iterable<string>
): Result<ReadonlySet<SigningAlgorithm>, ConfigError> => {
  const accepted = new Set<SigningAlgorithm>();
  for (const value of values) {
    if (!isSupportedAlgorithm(value)) {
      return err({
        code: 'UNSUPPORTED_ALGORITHM',
        field: 'acceptedAlgorithms',
        message: `Algorithm '${value}' is not a supported signing algorithm`,
      });
    }
    accepted.add(value);
  }
  return ok(accepted);
};

const validateNonNegative = (
  field: 'minRefreshIntervalSeconds' | 'clockToleranceSeconds',
  value: number
): Result<number, ConfigError> =>
  Number.isFinite(value) && value >= 0
    ? ok(value)
    : err({
        code: 'INVALID_NUMBER',
        field,
        message: `${field} must be a non-negative number, got ${String(value)}`,
      });

const compileConfiguredPolicy = (
  expression: string | undefined
): Result<PolicyProgram | undefined, ConfigError> => {
  if (expression === undefined || expression.trim() === '') {
    return ok(undefined);
  }
  return compilePolicy(expression).mapErr(
    (error): ConfigError => ({
      code: 'INVALID_POLICY',
      field: 'policyExpression',
      message: `Policy expression does not compile: ${error.message}`,
      cause: error,
    })
  );
};

/**
 * Validates raw options and builds the frozen authorizer configuration.
 * The policy expression, if any, is compiled here.
 *
 * @example
 * ```typescript
 * const config = createAuthorizerConfig({
 *   jwksUri: 'https://auth.example.com/.well-known/jwks.json',
 *   acceptedIssuers: ['https://auth.example.com'],
 *   acceptedAlgorithms: ['RS256'],
 * });
 * if (config.isErr()) {
 *   throw new Error(config.error.message);
 * }
 * ```
 */
export const createAuthorizerConfig = (
  options: AuthorizerConfigOptions
): Result<AuthorizerConfig, ConfigError> => {
  const {
    jwksUri,
    acceptedIssuers = [],
    acceptedAudiences = [],
    acceptedAlgorithms = [],
    principalClaims = DEFAULT_PRINCIPAL_CLAIMS,
    defaultPrincipal = DEFAULT_PRINCIPAL,
    minRefreshIntervalSeconds = DEFAULT_MIN_REFRESH_INTERVAL_SECONDS,
    clockToleranceSeconds = 0,
    policyExpression,
  } = options;

  const uri = validateJwksUri(jwksUri);
  if (uri.isErr()) {
    return err(uri.error);
  }

  const algorithms = validateAlgorithms(acceptedAlgorithms);
  if (algorithms.isErr()) {
    return err(algorithms.error);
  }

  const refreshSeconds = validateNonNegative('minRefreshIntervalSeconds', minRefreshIntervalSeconds);
  if (refreshSeconds.isErr()) {
    return err(refreshSeconds.error);
  }

  const tolerance = validateNonNegative('clockToleranceSeconds', clockToleranceSeconds);
  if (tolerance.isErr()) {
    return err(tolerance.error);
  }

  return compileConfiguredPolicy(policyExpression).map(
    (policy): AuthorizerConfig =>
      Object.freeze({
        jwksUri: uri.value,
        acceptedIssuers: new Set(acceptedIssuers),
        acceptedAudiences: new Set(acceptedAudiences),
        acceptedAlgorithms: algorithms.value,
        principalClaims: Object.freeze([...principalClaims]),
        defaultPrincipal,
        minRefreshIntervalMs: refreshSeconds.value * 1000,
        clockToleranceSeconds: tolerance.value,
        policy,
      })
  );
};
