import { describe, it, expect } from 'vitest';
import { extractBearerToken } from './extract.js';

describe('extractBearerToken', () => {
  describe('given a bearer header', () => {
    it('returns the token after the prefix', () => {
      const result = extractBearerToken('Bearer abc.def.ghi');

      expect(result._unsafeUnwrap()).toBe('abc.def.ghi');
    });

    it('keeps any further whitespace as part of the token', () => {
      const result = extractBearerToken('Bearer  abc');

      expect(result._unsafeUnwrap()).toBe(' abc');
    });
  });

  describe('given no header', () => {
    it('returns MALFORMED_REQUEST', () => {
      const result = extractBearerToken(undefined);

      expect(result._unsafeUnwrapErr().code).toBe('MALFORMED_REQUEST');
    });
  });

  describe('given a header without the bearer prefix', () => {
    it.each([
      ['empty string', ''],
      ['basic scheme', 'Basic dXNlcjpwYXNz'],
      ['lower-case scheme', 'bearer abc.def.ghi'],
      ['scheme without space', 'Bearerabc.def.ghi'],
      ['bare token', 'abc.def.ghi'],
    ])('returns MALFORMED_REQUEST for %s', (_label, header) => {
      const result = extractBearerToken(header);

      expect(result._unsafeUnwrapErr()).toEqual({
        code: 'MALFORMED_REQUEST',
        message: "Authorization header must start with 'Bearer '",
      });
    });
  });

  describe('given the prefix with an empty token', () => {
    it('returns MALFORMED_REQUEST', () => {
      const result = extractBearerToken('Bearer ');

      expect(result._unsafeUnwrapErr().code).toBe('MALFORMED_REQUEST');
    });
  });
});
