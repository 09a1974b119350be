import { ok, err, type Result } from 'neverthrow';
import type { DenialError, KeyFamily, SigningAlgorithm } from '../types.js';
import { createDenial } from './errors.js';

/**
 * Algorithms the authorizer can verify, mapped to the key family they require.
 * No symmetric algorithms: keys come from a public key set.
 */
const ALGORITHM_FAMILIES: Readonly<Record<SigningAlgorithm, KeyFamily>> = {
  ES256: 'EC',
  ES384: 'EC',
  RS256: 'RSA',
  RS384: 'RSA',
  RS512: 'RSA',
  PS256: 'RSA',
  PS384: 'RSA',
  PS512: 'RSA',
  EdDSA: 'OKP',
};

export const SUPPORTED_ALGORITHMS: readonly SigningAlgorithm[] = [
  'ES256',
  'ES384',
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
  'EdDSA',
];

/**
 * Type guard for supported signing algorithms.
 */
export const isSupportedAlgorithm = (value: string): value is SigningAlgorithm =>
  SUPPORTED_ALGORITHMS.some((algorithm) => algorithm === value);

/**
 * Returns the key family an algorithm signs with.
 */
export const keyFamilyOf = (algorithm: SigningAlgorithm): KeyFamily =>
  ALGORITHM_FAMILIES[algorithm];

/**
 * Checks a token's declared algorithm against the supported set and, when
 * non-empty, the configured accepted set. Runs before any key lookup.
 *
 * @param algorithm - The `alg` header value
 * @param accepted - Configured accepted algorithms (empty accepts all supported)
 * @returns Result with the narrowed algorithm or an UNSUPPORTED_ALGORITHM denial
 */
export const checkAlgorithm = (
  algorithm: string,
  accepted: ReadonlySet<SigningAlgorithm>
): Result<SigningAlgorithm, DenialError> => {
  if (!isSupportedAlgorithm(algorithm)) {
    return err(
      createDenial('UNSUPPORTED_ALGORITHM', `Algorithm '${algorithm}' is not supported`)
    );
  }

  if (accepted.size > 0 && !accepted.has(algorithm)) {
    return err(
      createDenial(
        'UNSUPPORTED_ALGORITHM',
        `Algorithm '${algorithm}' is not accepted (accepted: ${[...accepted].join(', ')})`
      )
    );
  }

  return ok(algorithm);
};
