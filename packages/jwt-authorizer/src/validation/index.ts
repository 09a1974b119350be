export { extractBearerToken, BEARER_PREFIX } from './extract.js';
export { decodeTokenHeader } from './header.js';
export {
  checkAlgorithm,
  isSupportedAlgorithm,
  keyFamilyOf,
  SUPPORTED_ALGORITHMS,
} from './algorithms.js';
export { verifyToken } from './verify.js';
export type { VerifyOptions } from './verify.js';
export { checkIssuer, checkAudience, checkClaims, audienceValues } from './claims.js';
export { createDenial, denialMessages, mapJoseError } from './errors.js';
