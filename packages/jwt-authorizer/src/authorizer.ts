import { ok, err, Result } from 'neverthrow';
import type { Logger } from 'pino';
import type {
  AllowDecision,
  AuthorizedToken,
  AuthorizerConfig,
  Clock,
  Decision,
  DenialError,
  TokenClaims,
  TokenHeader,
} from './types.js';
import type { KeyStore } from './cache/types.js';
import { extractBearerToken } from './validation/extract.js';
import { decodeTokenHeader } from './validation/header.js';
import { checkAlgorithm } from './validation/algorithms.js';
import { verifyToken } from './validation/verify.js';
import { checkClaims } from './validation/claims.js';
import { createDenial } from './validation/errors.js';
import { resolvePrincipal } from './principal.js';
import { allowDecision, denyDecision } from './decision.js';
import { systemClock } from './clock.js';
import { createSilentLogger } from './logger.js';

/**
 * Collaborators of the authorizer.
 */
export interface AuthorizerDependencies {
  /** Source of verification keys */
  readonly keyStore: KeyStore;
  /** Time source for `exp` and `nbf` (default: system clock) */
  readonly clock?: Clock;
  /** Logger for denials (default: silent) */
  readonly logger?: Logger;
}

/**
 * Request authorizer.
 */
export interface Authorizer {
  /**
   * Runs the validation pipeline and returns the authorized token or the
   * first denial encountered. Never rejects: an unexpected failure becomes
   * an INTERNAL_ERROR denial.
   * @param headerValue - The Authorization header value
   */
  readonly evaluate: (headerValue: string | undefined) => Promise<Result<AuthorizedToken, DenialError>>;

  /**
   * Runs the pipeline and turns its outcome into a decision. Denials are
   * logged with their code; the token itself is never logged. Never rejects.
   * @param headerValue - The Authorization header value
   */
  readonly authorize: (headerValue: string | undefined) => Promise<Decision>;
}

const checkPolicy = (
  config: AuthorizerConfig,
  header: TokenHeader,
  claims: TokenClaims
): Result<TokenClaims, DenialError> => {
  if (config.policy === undefined) {
    return ok(claims);
  }

  const outcome = config.policy.evaluate({ header, claims });
  if (outcome.isErr()) {
    return err(createDenial('POLICY_REJECTED', outcome.error.message, outcome.error));
  }
  if (!outcome.value) {
    return err(createDenial('POLICY_REJECTED', 'Policy expression evaluated to false'));
  }
  return ok(claims);
};

/**
 * Creates an authorizer for one configuration.
 *
 * Stages run in order and stop at the first failure: bearer extraction,
 * header decoding, algorithm gate, key lookup, signature and temporal
 * validation, issuer and audience checks, policy, principal resolution.
 * Everything before the key lookup is local, so malformed or disallowed
 * tokens never cause a key set fetch.
 *
 * @example
 * ```typescript
 * const authorizer = createAuthorizer(config, {
 *   keyStore: createKeyStore({ jwksUri: config.jwksUri, minRefreshIntervalMs: config.minRefreshIntervalMs }),
 * });
 *
 * const decision = await authorizer.authorize(request.headers.authorization);
 * if (decision.effect === 'Allow') {
 *   console.log(decision.principalId);
 * }
 * ```
 */
export const createAuthorizer = (
  config: AuthorizerConfig,
  dependencies: AuthorizerDependencies
): Authorizer => {
  const { keyStore, clock = systemClock, logger = createSilentLogger() } = dependencies;

  const runPipeline = async (
    headerValue: string | undefined
  ): Promise<Result<AuthorizedToken, DenialError>> => {
    const token = extractBearerToken(headerValue);
    if (token.isErr()) {
      return err(token.error);
    }

    const header = decodeTokenHeader(token.value);
    if (header.isErr()) {
      return err(header.error);
    }

    const algorithm = checkAlgorithm(header.value.alg, config.acceptedAlgorithms);
    if (algorithm.isErr()) {
      return err(algorithm.error);
    }

    const key = await keyStore.lookup(header.value.kid);
    if (key.isErr()) {
      return err(key.error);
    }

    const verified = await verifyToken(token.value, key.value, algorithm.value, {
      currentDate: new Date(clock.now()),
      clockToleranceSeconds: config.clockToleranceSeconds,
    });

    return verified
      .andThen((claims) => checkClaims(claims, config.acceptedIssuers, config.acceptedAudiences))
      .andThen((claims) => checkPolicy(config, header.value, claims))
      .map(
        (claims): AuthorizedToken => ({
          header: header.value,
          claims,
          principalId: resolvePrincipal(config.principalClaims, claims, config.defaultPrincipal),
        })
      );
  };

  const evaluate = async (
    headerValue: string | undefined
  ): Promise<Result<AuthorizedToken, DenialError>> => {
    try {
      return await runPipeline(headerValue);
    } catch (error) {
      return err(createDenial('INTERNAL_ERROR', 'Token could not be processed', error));
    }
  };

  const buildAllow = Result.fromThrowable(
    (authorized: AuthorizedToken): AllowDecision =>
      allowDecision(authorized.principalId, authorized.claims),
    (error) => createDenial('INTERNAL_ERROR', 'Decision context could not be built', error)
  );

  const authorize = async (headerValue: string | undefined): Promise<Decision> => {
    const outcome = (await evaluate(headerValue)).andThen(buildAllow);

    if (outcome.isErr()) {
      const { code, message } = outcome.error;
      if (code === 'INTERNAL_ERROR') {
        logger.warn({ code, reason: message, err: outcome.error.cause }, 'Request denied');
      } else {
        logger.info({ code, reason: message }, 'Request denied');
      }
      return denyDecision();
    }

    logger.debug({ principalId: outcome.value.principalId }, 'Request allowed');
    return outcome.value;
  };

  return { evaluate, authorize };
};
