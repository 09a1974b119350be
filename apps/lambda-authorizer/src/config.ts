import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import {
  createAuthorizerConfig,
  type AuthorizerConfig,
  type AuthorizerConfigOptions,
} from 'jwt-authorizer';
import type { LevelWithSilent } from 'pino';
import { LOG_LEVELS } from './logger.js';

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Splits a comma separated variable. Entries are trimmed and empty entries
 * dropped; an unset variable yields an empty list.
 */
export const parseList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value.trim() === '' ? undefined : value;

const listVariable = z.string().optional().transform(parseList);

const secondsVariable = z
  .string()
  .optional()
  .transform((value, context) => {
    const text = emptyToUndefined(value)?.trim();
    if (text === undefined) {
      return undefined;
    }
    const seconds = Number(text);
    if (!Number.isFinite(seconds) || seconds < 0) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must be a non-negative number of seconds, got '${text}'`,
      });
      return z.NEVER;
    }
    return seconds;
  });

const environmentSchema = z.object({
  JWKS_URI: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  ACCEPTED_ISSUERS: listVariable,
  ACCEPTED_AUDIENCES: listVariable,
  ACCEPTED_ALGORITHMS: listVariable,
  MIN_REFRESH_RATE: secondsVariable,
  PRINCIPAL_ID_CLAIMS: z
    .string()
    .optional()
    .transform((value) => {
      const claims = parseList(value);
      return claims.length > 0 ? claims : undefined;
    }),
  DEFAULT_PRINCIPAL_ID: z.string().optional().transform(emptyToUndefined),
  TOKEN_VALIDATION_CEL: z.string().optional(),
  CLOCK_TOLERANCE_SECONDS: secondsVariable,
  LOG_LEVEL: z
    .string()
    .optional()
    .transform((value) => emptyToUndefined(value)?.trim().toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('info')),
});

/** Environment variable that feeds each authorizer option */
const OPTION_VARIABLES: Readonly<Record<keyof AuthorizerConfigOptions, string>> = {
  jwksUri: 'JWKS_URI',
  acceptedIssuers: 'ACCEPTED_ISSUERS',
  acceptedAudiences: 'ACCEPTED_AUDIENCES',
  acceptedAlgorithms: 'ACCEPTED_ALGORITHMS',
  principalClaims: 'PRINCIPAL_ID_CLAIMS',
  defaultPrincipal: 'DEFAULT_PRINCIPAL_ID',
  minRefreshIntervalSeconds: 'MIN_REFRESH_RATE',
  clockToleranceSeconds: 'CLOCK_TOLERANCE_SECONDS',
  policyExpression: 'TOKEN_VALIDATION_CEL',
};

export interface LoadedConfig {
  readonly authorizer: AuthorizerConfig;
  readonly logLevel: LevelWithSilent;
}

/**
 * Invalid environment. `variable` names the offending setting.
 */
export interface EnvironmentError {
  readonly variable: string;
  readonly message: string;
}

/**
 * Reads the function configuration from environment variables.
 *
 * Required:
 * - JWKS_URI: key set URL
 *
 * Optional:
 * - ACCEPTED_ISSUERS, ACCEPTED_AUDIENCES, ACCEPTED_ALGORITHMS: comma separated, empty accepts all
 * - MIN_REFRESH_RATE: seconds between key set refreshes (default: 900)
 * - PRINCIPAL_ID_CLAIMS: comma separated (default: "preferred_username, sub")
 * - DEFAULT_PRINCIPAL_ID: fallback principal (default: "unknown")
 * - TOKEN_VALIDATION_CEL: policy expression
 * - CLOCK_TOLERANCE_SECONDS: leeway for exp/nbf (default: 0)
 * - LOG_LEVEL: pino level (default: info)
 */
export const loadConfig = (env: Environment): Result<LoadedConfig, EnvironmentError> => {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const variable = typeof issue?.path[0] === 'string' ? issue.path[0] : 'environment';
    return err({ variable, message: `${variable} ${issue?.message ?? 'is invalid'}` });
  }

  const vars = parsed.data;
  const authorizer = createAuthorizerConfig({
    jwksUri: vars.JWKS_URI,
    acceptedIssuers: vars.ACCEPTED_ISSUERS,
    acceptedAudiences: vars.ACCEPTED_AUDIENCES,
    acceptedAlgorithms: vars.ACCEPTED_ALGORITHMS,
    principalClaims: vars.PRINCIPAL_ID_CLAIMS,
    defaultPrincipal: vars.DEFAULT_PRINCIPAL_ID,
    minRefreshIntervalSeconds: vars.MIN_REFRESH_RATE,
    clockToleranceSeconds: vars.CLOCK_TOLERANCE_SECONDS,
    policyExpression: vars.TOKEN_VALIDATION_CEL,
  });

  if (authorizer.isErr()) {
    const variable = OPTION_VARIABLES[authorizer.error.field];
    return err({ variable, message: `${variable}: ${authorizer.error.message}` });
  }

  return ok({ authorizer: authorizer.value, logLevel: vars.LOG_LEVEL });
};
