import { ok, err, type Result } from 'neverthrow';
import { importJWK, type JWK } from 'jose';
import { z } from 'zod';
import type { DenialError, KeyFamily, KeyRecord, SigningAlgorithm } from '../types.js';
import { createDenial } from '../validation/errors.js';
import { isSupportedAlgorithm, keyFamilyOf } from '../validation/algorithms.js';

/**
 * Top-level shape of a JSON Web Key Set document. Entries are validated one by
 * one so that a single unusable key does not invalidate the whole set.
 */
const keySetDocumentSchema = z.object({
  keys: z.array(z.unknown()),
});

const jwkSchema = z.object({
  kty: z.string(),
  kid: z.string().optional(),
  alg: z.string().optional(),
  use: z.string().optional(),
  crv: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
});

type JwkEntry = z.infer<typeof jwkSchema>;

/** Public key members copied into the JWK handed to jose */
const PUBLIC_MEMBERS = ['kid', 'alg', 'use', 'crv', 'n', 'e', 'x', 'y'] as const;

/** Algorithm used to import EC keys, by curve */
const EC_CURVE_ALGORITHMS: Readonly<Record<string, SigningAlgorithm>> = {
  'P-256': 'ES256',
  'P-384': 'ES384',
};

const OKP_CURVES: readonly string[] = ['Ed25519', 'Ed448'];

/**
 * Key set entry that was not indexed, with the reason.
 */
export interface SkippedKey {
  readonly keyId: string | undefined;
  readonly reason: string;
}

/**
 * Result of parsing a key set document.
 */
export interface ParsedKeySet {
  readonly keys: ReadonlyMap<string, KeyRecord>;
  readonly skipped: readonly SkippedKey[];
}

const toKeyFamily = (kty: string): KeyFamily | undefined => {
  switch (kty) {
    case 'RSA':
    case 'EC':
    case 'OKP':
      return kty;
    default:
      return undefined;
  }
};

/**
 * Picks the algorithm a key is imported for. An advertised `alg` wins when it
 * belongs to the key's family; otherwise the family default (or the curve's
 * algorithm) is used.
 */
const selectImportAlgorithm = (
  entry: JwkEntry,
  family: KeyFamily
): Result<SigningAlgorithm, string> => {
  if (entry.alg !== undefined) {
    if (!isSupportedAlgorithm(entry.alg) || keyFamilyOf(entry.alg) !== family) {
      return err(`algorithm '${entry.alg}' is not supported for ${family} keys`);
    }
    return ok(entry.alg);
  }

  switch (family) {
    case 'RSA':
      return ok('RS256');
    case 'EC': {
      const algorithm = entry.crv === undefined ? undefined : EC_CURVE_ALGORITHMS[entry.crv];
      return algorithm === undefined
        ? err(`curve '${entry.crv ?? '(none)'}' is not supported`)
        : ok(algorithm);
    }
    case 'OKP':
      return entry.crv !== undefined && OKP_CURVES.includes(entry.crv)
        ? ok('EdDSA')
        : err(`curve '${entry.crv ?? '(none)'}' is not supported`);
  }
};

const toJwk = (entry: JwkEntry): JWK => {
  const jwk: JWK = { kty: entry.kty };
  for (const member of PUBLIC_MEMBERS) {
    const value = entry[member];
    if (value !== undefined) {
      jwk[member] = value;
    }
  }
  return jwk;
};

const importEntry = async (
  raw: unknown
): Promise<Result<KeyRecord, SkippedKey>> => {
  const parsed = jwkSchema.safeParse(raw);
  if (!parsed.success) {
    return err({ keyId: undefined, reason: 'entry is not a valid JWK' });
  }

  const entry = parsed.data;
  const keyId = entry.kid;
  if (keyId === undefined || keyId.length === 0) {
    return err({ keyId: undefined, reason: 'entry has no "kid"' });
  }

  if (entry.use !== undefined && entry.use !== 'sig') {
    return err({ keyId, reason: `key use '${entry.use}' is not "sig"` });
  }

  const family = toKeyFamily(entry.kty);
  if (family === undefined) {
    return err({ keyId, reason: `key type '${entry.kty}' is not supported` });
  }

  const algorithm = selectImportAlgorithm(entry, family);
  if (algorithm.isErr()) {
    return err({ keyId, reason: algorithm.error });
  }

  try {
    const key = await importJWK(toJwk(entry), algorithm.value);
    const record: KeyRecord =
      entry.alg !== undefined
        ? { keyId, family, key, algorithm: entry.alg }
        : { keyId, family, key };
    return ok(record);
  } catch (error) {
    return err({
      keyId,
      reason: `key material could not be imported: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
};

/**
 * Parses a JSON Web Key Set document into a map of verification keys.
 *
 * Entries without a `kid`, with an unsupported key type or curve, or whose
 * material cannot be imported are reported in `skipped` and left out of the
 * map. A document that is not an object with a `keys` array is an error.
 *
 * @param document - The decoded JSON body of the key set endpoint
 * @returns Result with the parsed key set or an UPSTREAM_FETCH_FAILED denial
 */
export const parseKeySet = async (
  document: unknown
): Promise<Result<ParsedKeySet, DenialError>> => {
  const parsed = keySetDocumentSchema.safeParse(document);
  if (!parsed.success) {
    return err(
      createDenial(
        'UPSTREAM_FETCH_FAILED',
        'Key set document must be an object with a "keys" array',
        parsed.error
      )
    );
  }

  const keys = new Map<string, KeyRecord>();
  const skipped: SkippedKey[] = [];

  const imported = await Promise.all(parsed.data.keys.map(importEntry));
  for (const result of imported) {
    if (result.isOk()) {
      keys.set(result.value.keyId, result.value);
    } else {
      skipped.push(result.error);
    }
  }

  return ok({ keys, skipped });
};
