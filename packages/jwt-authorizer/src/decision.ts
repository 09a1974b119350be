import type { AllowDecision, DenyDecision, TokenClaims } from './types.js';
import { claimToString } from './principal.js';

/** Prefix of the per-claim context entries */
export const CLAIM_CONTEXT_PREFIX = 'jwt_claim_';

/** Context entry holding the resolved principal */
export const PRINCIPAL_CONTEXT_KEY = 'jwt_principal';

/** Context entry holding the whole claim set as compact JSON */
export const CLAIMS_CONTEXT_KEY = 'claims';

/**
 * Builds the context attached to an Allow decision: the principal, the whole
 * claim set as compact JSON, and one `jwt_claim_<name>` entry per top-level claim.
 *
 * @throws RangeError when a claim is nested too deeply to serialize
 */
export const buildContext = (
  principalId: string,
  claims: TokenClaims
): Readonly<Record<string, string>> => {
  const context: Record<string, string> = {};
  for (const [name, value] of Object.entries(claims)) {
    if (value !== undefined) {
      context[`${CLAIM_CONTEXT_PREFIX}${name}`] = claimToString(value);
    }
  }
  context[PRINCIPAL_CONTEXT_KEY] = principalId;
  context[CLAIMS_CONTEXT_KEY] = JSON.stringify(claims);
  return context;
};

export const allowDecision = (principalId: string, claims: TokenClaims): AllowDecision => ({
  effect: 'Allow',
  resource: '*',
  principalId,
  context: buildContext(principalId, claims),
});

export const denyDecision = (): DenyDecision => ({ effect: 'Deny' });
