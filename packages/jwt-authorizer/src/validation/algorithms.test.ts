import { describe, it, expect } from 'vitest';
import { checkAlgorithm, keyFamilyOf, SUPPORTED_ALGORITHMS } from './algorithms.js';
import type { SigningAlgorithm } from '../types.js';

const NONE: ReadonlySet<SigningAlgorithm> = new Set();

describe('checkAlgorithm', () => {
  describe('given an empty accepted set', () => {
    it.each(SUPPORTED_ALGORITHMS)('accepts %s', (algorithm) => {
      const result = checkAlgorithm(algorithm, NONE);

      expect(result._unsafeUnwrap()).toBe(algorithm);
    });

    it.each(['HS256', 'none', 'ES512', 'rs256'])('rejects %s', (algorithm) => {
      const result = checkAlgorithm(algorithm, NONE);

      expect(result._unsafeUnwrapErr()).toEqual({
        code: 'UNSUPPORTED_ALGORITHM',
        message: `Algorithm '${algorithm}' is not supported`,
      });
    });
  });

  describe('given a non-empty accepted set', () => {
    const accepted: ReadonlySet<SigningAlgorithm> = new Set(['RS256', 'ES256']);

    it('accepts a member', () => {
      expect(checkAlgorithm('ES256', accepted).isOk()).toBe(true);
    });

    it('rejects a supported algorithm outside the set', () => {
      const result = checkAlgorithm('PS256', accepted);

      expect(result._unsafeUnwrapErr()).toEqual({
        code: 'UNSUPPORTED_ALGORITHM',
        message: "Algorithm 'PS256' is not accepted (accepted: RS256, ES256)",
      });
    });
  });
});

describe('keyFamilyOf', () => {
  it('maps each algorithm to its key type', () => {
    expect(keyFamilyOf('ES384')).toBe('EC');
    expect(keyFamilyOf('PS512')).toBe('RSA');
    expect(keyFamilyOf('RS256')).toBe('RSA');
    expect(keyFamilyOf('EdDSA')).toBe('OKP');
  });
});
