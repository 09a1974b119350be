import { describe, it, expect } from 'vitest';
import { allowDecision, denyDecision } from './decision.js';
import { TEST_ISSUER, TEST_SUBJECT } from './test/fixtures.js';

describe('allowDecision', () => {
  describe('given a set of claims', () => {
    const claims = {
      iss: TEST_ISSUER,
      sub: TEST_SUBJECT,
      aud: ['api', 'web'],
      exp: 1_700_000_000,
      email_verified: true,
    };

    it('allows every resource', () => {
      const decision = allowDecision(TEST_SUBJECT, claims);

      expect(decision.effect).toBe('Allow');
      expect(decision.resource).toBe('*');
      expect(decision.principalId).toBe(TEST_SUBJECT);
    });

    it('builds the context from the principal and claims', () => {
      const decision = allowDecision(TEST_SUBJECT, claims);

      expect(decision.context).toEqual({
        jwt_principal: TEST_SUBJECT,
        claims: JSON.stringify(claims),
        jwt_claim_iss: TEST_ISSUER,
        jwt_claim_sub: TEST_SUBJECT,
        jwt_claim_aud: '["api","web"]',
        jwt_claim_exp: '1700000000',
        jwt_claim_email_verified: 'true',
      });
    });
  });

  describe('given a claim named like the principal entry', () => {
    it('keeps both entries apart', () => {
      const decision = allowDecision('jdoe', { sub: 'user-123', principal: 'someone-else' });

      expect(decision.context['jwt_principal']).toBe('jdoe');
      expect(decision.context['jwt_claim_principal']).toBe('someone-else');
    });
  });
});

describe('denyDecision', () => {
  it('carries no context', () => {
    expect(denyDecision()).toEqual({ effect: 'Deny' });
  });
});
