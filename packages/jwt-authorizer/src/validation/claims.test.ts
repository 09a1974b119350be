import { describe, it, expect } from 'vitest';
import { audienceValues, checkAudience, checkClaims, checkIssuer } from './claims.js';
import { TEST_AUDIENCE, TEST_ISSUER, TEST_SUBJECT } from '../test/fixtures.js';

const EMPTY: ReadonlySet<string> = new Set();

describe('checkIssuer', () => {
  describe('given an empty accepted set', () => {
    it('accepts any issuer', () => {
      expect(checkIssuer({ iss: 'https://other.example.com' }, EMPTY).isOk()).toBe(true);
    });

    it('accepts a token without an issuer', () => {
      expect(checkIssuer({ sub: TEST_SUBJECT }, EMPTY).isOk()).toBe(true);
    });
  });

  describe('given an accepted set', () => {
    const accepted = new Set([TEST_ISSUER]);

    it('accepts a listed issuer', () => {
      expect(checkIssuer({ iss: TEST_ISSUER }, accepted).isOk()).toBe(true);
    });

    it('rejects an unlisted issuer', () => {
      const result = checkIssuer({ iss: 'https://evil.example.com' }, accepted);

      expect(result._unsafeUnwrapErr()).toEqual({
        code: 'ISSUER_REJECTED',
        message: "Issuer 'https://evil.example.com' is not accepted",
      });
    });

    it('rejects a missing issuer', () => {
      const result = checkIssuer({ sub: TEST_SUBJECT }, accepted);

      expect(result._unsafeUnwrapErr().code).toBe('ISSUER_REJECTED');
    });
  });
});

describe('checkAudience', () => {
  const accepted = new Set([TEST_AUDIENCE]);

  describe('given an empty accepted set', () => {
    it('accepts a token without an audience', () => {
      expect(checkAudience({ sub: TEST_SUBJECT }, EMPTY).isOk()).toBe(true);
    });
  });

  describe('given a single audience', () => {
    it('accepts a listed audience', () => {
      expect(checkAudience({ aud: TEST_AUDIENCE }, accepted).isOk()).toBe(true);
    });

    it('rejects an unlisted audience', () => {
      const result = checkAudience({ aud: 'other-api' }, accepted);

      expect(result._unsafeUnwrapErr()).toEqual({
        code: 'AUDIENCE_REJECTED',
        message: "Audience 'other-api' is not accepted",
      });
    });
  });

  describe('given a list of audiences', () => {
    it('accepts when any entry is listed', () => {
      expect(checkAudience({ aud: ['other-api', TEST_AUDIENCE] }, accepted).isOk()).toBe(true);
    });

    it('rejects when no entry is listed', () => {
      const result = checkAudience({ aud: ['a', 'b'] }, accepted);

      expect(result._unsafeUnwrapErr().message).toBe("Audience 'a', 'b' is not accepted");
    });
  });

  describe('given no audience', () => {
    it('rejects with a missing-claim message', () => {
      const result = checkAudience({ sub: TEST_SUBJECT }, accepted);

      expect(result._unsafeUnwrapErr()).toEqual({
        code: 'AUDIENCE_REJECTED',
        message: 'Token is missing the "aud" claim',
      });
    });
  });
});

describe('checkClaims', () => {
  it('reports the issuer failure before the audience failure', () => {
    const result = checkClaims(
      { iss: 'https://evil.example.com', aud: 'other-api' },
      new Set([TEST_ISSUER]),
      new Set([TEST_AUDIENCE])
    );

    expect(result._unsafeUnwrapErr().code).toBe('ISSUER_REJECTED');
  });
});

describe('audienceValues', () => {
  it('ignores non-string entries', () => {
    expect(audienceValues(['a', 1, null, 'b'])).toEqual(['a', 'b']);
  });

  it('returns nothing for a non-string, non-list value', () => {
    expect(audienceValues(42)).toEqual([]);
  });
});
