import { ok, err, type Result } from 'neverthrow';
import { decodeProtectedHeader } from 'jose';
import type { DenialError, TokenHeader } from '../types.js';
import { createDenial } from './errors.js';

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.length > 0;

/**
 * Decodes the protected header of a compact JWS without verifying the signature.
 * The result is untrusted until the signature has been checked.
 *
 * @param token - The compact serialized token
 * @returns Result with the decoded header or a MALFORMED_REQUEST denial
 */
export const decodeTokenHeader = (token: string): Result<TokenHeader, DenialError> => {
  let decoded: Record<string, unknown>;
  try {
    decoded = { ...decodeProtectedHeader(token) };
  } catch (error) {
    return err(createDenial('MALFORMED_REQUEST', 'Token header could not be decoded', error));
  }

  const { alg, kid } = decoded;

  if (!isNonEmptyString(alg)) {
    return err(createDenial('MALFORMED_REQUEST', 'Token header is missing "alg"'));
  }
  if (!isNonEmptyString(kid)) {
    return err(createDenial('MALFORMED_REQUEST', 'Token header is missing "kid"'));
  }

  const header: TokenHeader = { ...decoded, alg, kid };

  return ok(header);
};
