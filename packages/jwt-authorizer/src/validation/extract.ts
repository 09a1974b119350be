import { ok, err, type Result } from 'neverthrow';
import type { DenialError } from '../types.js';
import { createDenial } from './errors.js';

/** Case-sensitive authorization scheme prefix, including the separating space */
export const BEARER_PREFIX = 'Bearer ';

/**
 * Extracts the raw token from an Authorization header value.
 *
 * @param headerValue - The header value, if the request carried one
 * @returns Result with the token or a MALFORMED_REQUEST denial
 *
 * @example
 * ```typescript
 * extractBearerToken('Bearer eyJhbGciOi...'); // ok('eyJhbGciOi...')
 * extractBearerToken('bearer eyJhbGciOi...'); // err(MALFORMED_REQUEST)
 * ```
 */
export const extractBearerToken = (
  headerValue: string | undefined
): Result<string, DenialError> => {
  if (headerValue === undefined) {
    return err(createDenial('MALFORMED_REQUEST', 'Authorization header is missing'));
  }

  if (!headerValue.startsWith(BEARER_PREFIX) || headerValue.length === BEARER_PREFIX.length) {
    return err(
      createDenial('MALFORMED_REQUEST', `Authorization header must start with '${BEARER_PREFIX}'`)
    );
  }

  return ok(headerValue.slice(BEARER_PREFIX.length));
};
