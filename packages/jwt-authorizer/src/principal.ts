import type { TokenClaims } from './types.js';

/**
 * Text form of a claim value: strings verbatim, anything else as compact JSON.
 */
export const claimToString = (value: unknown): string =>
  typeof value === 'string' ? value : (JSON.stringify(value) ?? '');

/**
 * Picks the principal identifier for a validated token.
 *
 * The first claim in `claimNames` that is present and has a non-empty text
 * form wins. When none qualifies the default principal is returned.
 *
 * @param claimNames - Claim names in priority order
 * @param claims - Verified token claims
 * @param defaultPrincipal - Fallback identifier
 *
 * @example
 * ```typescript
 * resolvePrincipal(['preferred_username', 'sub'], { sub: 'user-1' }, 'unknown'); // 'user-1'
 * ```
 */
export const resolvePrincipal = (
  claimNames: readonly string[],
  claims: TokenClaims,
  defaultPrincipal: string
): string => {
  for (const name of claimNames) {
    if (!Object.hasOwn(claims, name)) {
      continue;
    }
    const value = claimToString(claims[name]);
    if (value !== '') {
      return value;
    }
  }
  return defaultPrincipal;
};
