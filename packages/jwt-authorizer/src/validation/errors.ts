import { errors } from 'jose';
import type { DenialCode, DenialError } from '../types.js';

/**
 * Default diagnostic messages for each denial code.
 */
export const denialMessages: Record<DenialCode, string> = {
  MALFORMED_REQUEST: 'Authorization header or token is malformed',
  UNSUPPORTED_ALGORITHM: 'Token signing algorithm is not accepted',
  KEY_NOT_FOUND: 'Signing key is not known',
  UPSTREAM_FETCH_FAILED: 'Key set could not be fetched',
  SIGNATURE_INVALID: 'Token signature is invalid',
  TOKEN_EXPIRED: 'Token has expired',
  TOKEN_NOT_YET_VALID: 'Token is not yet valid',
  ISSUER_REJECTED: 'Token issuer is not accepted',
  AUDIENCE_REJECTED: 'Token audience is not accepted',
  POLICY_REJECTED: 'Token was rejected by the policy expression',
  INTERNAL_ERROR: 'Token could not be processed',
};

/**
 * Creates a DenialError, falling back to the default message for the code.
 *
 * @param code - The denial code
 * @param message - Optional diagnostic message
 * @param cause - Original error, if any
 */
export const createDenial = (
  code: DenialCode,
  message?: string,
  cause?: unknown
): DenialError => {
  const base = { code, message: message ?? denialMessages[code] };

  if (cause !== undefined) {
    return { ...base, cause };
  }

  return base;
};

/**
 * Maps jose verification errors to a DenialError.
 *
 * @param error - The error thrown by jose
 * @returns A DenialError object
 */
export const mapJoseError = (error: unknown): DenialError => {
  if (error instanceof errors.JWTExpired) {
    return createDenial('TOKEN_EXPIRED', 'Token has expired', error);
  }

  if (error instanceof errors.JWTClaimValidationFailed) {
    if (error.claim === 'nbf') {
      return createDenial('TOKEN_NOT_YET_VALID', 'Token is not yet valid', error);
    }
    return createDenial('MALFORMED_REQUEST', error.message, error);
  }

  if (error instanceof errors.JWSSignatureVerificationFailed) {
    return createDenial('SIGNATURE_INVALID', 'Token signature verification failed', error);
  }

  if (error instanceof errors.JOSEAlgNotAllowed || error instanceof errors.JOSENotSupported) {
    return createDenial('UNSUPPORTED_ALGORITHM', error.message, error);
  }

  if (error instanceof errors.JWSInvalid || error instanceof errors.JWTInvalid) {
    return createDenial('MALFORMED_REQUEST', 'Token format is invalid', error);
  }

  if (error instanceof Error) {
    return createDenial('SIGNATURE_INVALID', error.message || 'Token verification failed', error);
  }

  return createDenial('SIGNATURE_INVALID', 'Unknown token verification error', error);
};
