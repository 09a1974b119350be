import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import {
  createAuthorizer,
  createKeyStore,
  type Authorizer,
  type Clock,
  type HttpClient,
  type KeyStore,
} from 'jwt-authorizer';
import { loadConfig, type Environment, type EnvironmentError } from './config.js';
import { createLogger } from './logger.js';
import {
  denyResponse,
  toAuthorizerResponse,
  tokenAuthorizerEventSchema,
  type AuthorizerResponse,
} from './event.js';

/**
 * Process-wide state shared by every invocation. Built once per cold start
 * so the key cache survives between requests.
 */
export interface Runtime {
  readonly authorizer: Authorizer;
  readonly keyStore: KeyStore;
  readonly logger: Logger;
}

export interface RuntimeOverrides {
  readonly httpClient?: HttpClient;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export type AuthorizerHandler = (event: unknown) => Promise<AuthorizerResponse>;

export const createRuntime = (
  env: Environment,
  overrides: RuntimeOverrides = {}
): Result<Runtime, EnvironmentError> => {
  const loaded = loadConfig(env);
  if (loaded.isErr()) {
    return err(loaded.error);
  }

  const { authorizer: config, logLevel } = loaded.value;
  const logger = overrides.logger ?? createLogger(logLevel);

  const keyStore = createKeyStore({
    jwksUri: config.jwksUri,
    minRefreshIntervalMs: config.minRefreshIntervalMs,
    logger: logger.child({ component: 'key-store' }),
    ...(overrides.httpClient !== undefined && { httpClient: overrides.httpClient }),
    ...(overrides.clock !== undefined && { clock: overrides.clock }),
  });

  const authorizer = createAuthorizer(config, {
    keyStore,
    logger,
    ...(overrides.clock !== undefined && { clock: overrides.clock }),
  });

  logger.info(
    {
      jwksUri: config.jwksUri,
      acceptedIssuers: [...config.acceptedIssuers],
      acceptedAudiences: [...config.acceptedAudiences],
      acceptedAlgorithms: [...config.acceptedAlgorithms],
      policy: config.policy !== undefined,
    },
    'Authorizer configured'
  );

  return ok({ authorizer, keyStore, logger });
};

/**
 * Builds the function entry point. Every failure, including a malformed
 * event, produces a Deny response rather than an invocation error.
 */
export const createHandler = (runtime: Runtime): AuthorizerHandler => {
  const { authorizer, logger } = runtime;

  return async (event) => {
    const parsed = tokenAuthorizerEventSchema.safeParse(event);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues.map((issue) => issue.message) }, 'Malformed event');
      return denyResponse();
    }

    const decision = await authorizer.authorize(parsed.data.authorizationToken);
    return toAuthorizerResponse(decision);
  };
};
