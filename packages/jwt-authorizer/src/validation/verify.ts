import { ok, err, type Result } from 'neverthrow';
import { jwtVerify } from 'jose';
import type { DenialError, KeyRecord, SigningAlgorithm, TokenClaims } from '../types.js';
import { createDenial, mapJoseError } from './errors.js';
import { keyFamilyOf } from './algorithms.js';

/**
 * Options for token verification.
 */
export interface VerifyOptions {
  /** The time to validate `exp` and `nbf` against */
  readonly currentDate: Date;
  /** Leeway in seconds for `exp` and `nbf` (default: 0) */
  readonly clockToleranceSeconds?: number;
}

/**
 * Verifies a token signature with the given key and checks its temporal claims.
 *
 * `exp` is satisfied only while the current time is strictly before it and
 * `nbf` once the current time has reached it. Issuer and audience are left to
 * the claims gate. A key whose JWK advertised an `alg` only verifies tokens
 * declaring that same algorithm.
 *
 * @param token - The compact serialized token
 * @param keyRecord - Key selected by the token's `kid`
 * @param algorithm - The algorithm declared in the token header
 * @param options - Verification options
 * @returns Result with the verified claims or a denial
 */
export const verifyToken = async (
  token: string,
  keyRecord: KeyRecord,
  algorithm: SigningAlgorithm,
  options: VerifyOptions
): Promise<Result<TokenClaims, DenialError>> => {
  const expectedFamily = keyFamilyOf(algorithm);
  if (keyRecord.family !== expectedFamily) {
    return err(
      createDenial(
        'SIGNATURE_INVALID',
        `Key '${keyRecord.keyId}' (${keyRecord.family}) cannot verify ${algorithm} signatures`
      )
    );
  }

  if (keyRecord.algorithm !== undefined && keyRecord.algorithm !== algorithm) {
    return err(
      createDenial(
        'SIGNATURE_INVALID',
        `Key '${keyRecord.keyId}' is published for ${keyRecord.algorithm}, not ${algorithm}`
      )
    );
  }

  try {
    const { payload } = await jwtVerify(token, keyRecord.key, {
      algorithms: [algorithm],
      currentDate: options.currentDate,
      clockTolerance: options.clockToleranceSeconds ?? 0,
    });

    const claims: TokenClaims = payload;
    return ok(claims);
  } catch (error) {
    return err(mapJoseError(error));
  }
};
