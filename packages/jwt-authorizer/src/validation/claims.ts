import { ok, err, type Result } from 'neverthrow';
import type { DenialError, TokenClaims } from '../types.js';
import { createDenial } from './errors.js';

/**
 * Normalizes the `aud` claim into a list of string values.
 * Non-string entries are ignored.
 */
export const audienceValues = (aud: unknown): readonly string[] => {
  if (typeof aud === 'string') {
    return [aud];
  }
  if (Array.isArray(aud)) {
    return aud.filter((value): value is string => typeof value === 'string');
  }
  return [];
};

/**
 * Checks the `iss` claim. An empty accepted set accepts any issuer,
 * including a missing one.
 */
export const checkIssuer = (
  claims: TokenClaims,
  accepted: ReadonlySet<string>
): Result<TokenClaims, DenialError> => {
  if (accepted.size === 0) {
    return ok(claims);
  }

  const issuer = claims['iss'];
  if (typeof issuer !== 'string') {
    return err(createDenial('ISSUER_REJECTED', 'Token is missing the "iss" claim'));
  }

  if (!accepted.has(issuer)) {
    return err(createDenial('ISSUER_REJECTED', `Issuer '${issuer}' is not accepted`));
  }

  return ok(claims);
};

/**
 * Checks the `aud` claim. The token is accepted if any of its audience values
 * is in the accepted set. An empty accepted set accepts any audience.
 */
export const checkAudience = (
  claims: TokenClaims,
  accepted: ReadonlySet<string>
): Result<TokenClaims, DenialError> => {
  if (accepted.size === 0) {
    return ok(claims);
  }

  const audiences = audienceValues(claims['aud']);
  if (audiences.some((audience) => accepted.has(audience))) {
    return ok(claims);
  }

  return err(
    createDenial(
      'AUDIENCE_REJECTED',
      audiences.length === 0
        ? 'Token is missing the "aud" claim'
        : `Audience ${audiences.map((a) => `'${a}'`).join(', ')} is not accepted`
    )
  );
};

/**
 * Runs the issuer and audience checks in order.
 */
export const checkClaims = (
  claims: TokenClaims,
  acceptedIssuers: ReadonlySet<string>,
  acceptedAudiences: ReadonlySet<string>
): Result<TokenClaims, DenialError> =>
  checkIssuer(claims, acceptedIssuers).andThen((checked) =>
    checkAudience(checked, acceptedAudiences)
  );
