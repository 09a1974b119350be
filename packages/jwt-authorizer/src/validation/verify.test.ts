import { describe, it, expect, beforeAll } from 'vitest';
import { importJWK } from 'jose';
import { verifyToken } from './verify.js';
import type { KeyRecord } from '../types.js';
import {
  createTestSigningKey,
  createValidClaims,
  signTestToken,
  FIXED_NOW_MS,
  FIXED_NOW_SECONDS,
  TEST_KEY_ID,
  TEST_SUBJECT,
  type TestSigningKey,
} from '../test/fixtures.js';

const toKeyRecord = async (key: TestSigningKey, family: KeyRecord['family']): Promise<KeyRecord> => ({
  keyId: key.kid,
  family,
  key: await importJWK(key.publicJwk, key.alg),
});

const options = { currentDate: new Date(FIXED_NOW_MS) };

describe('verifyToken', () => {
  let rsaKey: TestSigningKey;
  let rsaRecord: KeyRecord;
  let ecKey: TestSigningKey;
  let ecRecord: KeyRecord;

  beforeAll(async () => {
    rsaKey = await createTestSigningKey(TEST_KEY_ID, 'RS256');
    rsaRecord = await toKeyRecord(rsaKey, 'RSA');
    ecKey = await createTestSigningKey('ec-key', 'ES256');
    ecRecord = await toKeyRecord(ecKey, 'EC');
  });

  describe('given a valid token', () => {
    it('returns the verified claims', async () => {
      const token = await signTestToken(rsaKey);

      const result = await verifyToken(token, rsaRecord, 'RS256', options);

      expect(result._unsafeUnwrap()['sub']).toBe(TEST_SUBJECT);
    });

    it('verifies an EC signature', async () => {
      const token = await signTestToken(ecKey);

      const result = await verifyToken(token, ecRecord, 'ES256', options);

      expect(result.isOk()).toBe(true);
    });
  });

  describe('given an expired token', () => {
    it('rejects a token whose exp has passed', async () => {
      const token = await signTestToken(rsaKey, createValidClaims({ exp: FIXED_NOW_SECONDS - 1 }));

      const result = await verifyToken(token, rsaRecord, 'RS256', options);

      expect(result._unsafeUnwrapErr().code).toBe('TOKEN_EXPIRED');
    });

    it('rejects a token whose exp is exactly now', async () => {
      const token = await signTestToken(rsaKey, createValidClaims({ exp: FIXED_NOW_SECONDS }));

      const result = await verifyToken(token, rsaRecord, 'RS256', options);

      expect(result._unsafeUnwrapErr().code).toBe('TOKEN_EXPIRED');
    });

    it('accepts it within the clock tolerance', async () => {
      const token = await signTestToken(rsaKey, createValidClaims({ exp: FIXED_NOW_SECONDS - 30 }));

      const result = await verifyToken(token, rsaRecord, 'RS256', {
        ...options,
        clockToleranceSeconds: 60,
      });

      expect(result.isOk()).toBe(true);
    });
  });

  describe('given a token with nbf', () => {
    it('rejects a token that is not yet valid', async () => {
      const token = await signTestToken(rsaKey, createValidClaims({ nbf: FIXED_NOW_SECONDS + 10 }));

      const result = await verifyToken(token, rsaRecord, 'RS256', options);

      expect(result._unsafeUnwrapErr().code).toBe('TOKEN_NOT_YET_VALID');
    });

    it('accepts a token whose nbf is exactly now', async () => {
      const token = await signTestToken(rsaKey, createValidClaims({ nbf: FIXED_NOW_SECONDS }));

      const result = await verifyToken(token, rsaRecord, 'RS256', options);

      expect(result.isOk()).toBe(true);
    });
  });

  describe('given a signature from another key', () => {
    it('returns SIGNATURE_INVALID', async () => {
      const impostor = await createTestSigningKey(TEST_KEY_ID, 'RS256');
      const token = await signTestToken(impostor);

      const result = await verifyToken(token, rsaRecord, 'RS256', options);

      expect(result._unsafeUnwrapErr().code).toBe('SIGNATURE_INVALID');
    });
  });

  describe('given a key from another family', () => {
    it('returns SIGNATURE_INVALID without verifying', async () => {
      const token = await signTestToken(rsaKey);

      const result = await verifyToken(token, ecRecord, 'RS256', options);

      expect(result._unsafeUnwrapErr()).toEqual({
        code: 'SIGNATURE_INVALID',
        message: "Key 'ec-key' (EC) cannot verify RS256 signatures",
      });
    });
  });

  describe('given a key published for another algorithm of the same family', () => {
    it('returns SIGNATURE_INVALID without verifying', async () => {
      const psKey = await createTestSigningKey('ps-key', 'PS256');
      const record: KeyRecord = {
        ...(await toKeyRecord(psKey, 'RSA')),
        algorithm: 'RS256',
      };
      const token = await signTestToken(psKey);

      const result = await verifyToken(token, record, 'PS256', options);

      expect(result._unsafeUnwrapErr()).toEqual({
        code: 'SIGNATURE_INVALID',
        message: "Key 'ps-key' is published for RS256, not PS256",
      });
    });

    it('verifies a token declaring the advertised algorithm', async () => {
      const record: KeyRecord = { ...rsaRecord, algorithm: 'RS256' };
      const token = await signTestToken(rsaKey);

      const result = await verifyToken(token, record, 'RS256', options);

      expect(result.isOk()).toBe(true);
    });
  });

  describe('given a tampered payload', () => {
    it('returns SIGNATURE_INVALID', async () => {
      const token = await signTestToken(rsaKey);
      const [header, , signature] = token.split('.');
      const forgedPayload = Buffer.from(JSON.stringify(createValidClaims({ sub: 'admin' }))).toString(
        'base64url'
      );

      const result = await verifyToken(
        `${header ?? ''}.${forgedPayload}.${signature ?? ''}`,
        rsaRecord,
        'RS256',
        options
      );

      expect(result._unsafeUnwrapErr().code).toBe('SIGNATURE_INVALID');
    });
  });
});
