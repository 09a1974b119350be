import { ok, err, type Result } from 'neverthrow';
import type { DenialError, KeyRecord } from '../types.js';
import type { KeyStore, KeyStoreOptions, KeyStoreSnapshot } from './types.js';
import type { ParsedKeySet } from './key-set.js';
import { parseKeySet } from './key-set.js';
import { createFetchClient } from '../http/fetch-client.js';
import { createDenial } from '../validation/errors.js';
import { systemClock } from '../clock.js';
import { createSilentLogger } from '../logger.js';

/**
 * Cache contents. Replaced as a whole by a completed refresh, never mutated.
 */
interface CacheState {
  readonly keys: ReadonlyMap<string, KeyRecord>;
  readonly lastRefreshAt: number | undefined;
}

/**
 * Creates a key store that refreshes optimistically from a remote key set.
 *
 * - Cached keys are returned without waiting on anything.
 * - A miss refreshes only if no refresh has completed yet, or if the last
 *   completed refresh is at least `minRefreshIntervalMs` old. Otherwise the
 *   miss fails immediately with no network access.
 * - Misses that arrive while a refresh is in flight wait for that refresh
 *   instead of starting another one.
 * - A refresh replaces the whole key map, so keys removed by the provider are
 *   dropped. A failed refresh leaves the previous state and timestamp intact.
 *
 * @param options - Key store configuration
 * @returns A KeyStore instance
 *
 * @example
 * ```typescript
 * const keyStore = createKeyStore({
 *   jwksUri: 'https://auth.example.com/.well-known/jwks.json',
 *   minRefreshIntervalMs: 15 * 60 * 1000,
 * });
 *
 * const result = await keyStore.lookup('key-1');
 * ```
 */
export const createKeyStore = (options: KeyStoreOptions): KeyStore => {
  const {
    jwksUri,
    minRefreshIntervalMs,
    httpClient = createFetchClient(),
    clock = systemClock,
    logger = createSilentLogger(),
  } = options;

  let state: CacheState = { keys: new Map(), lastRefreshAt: undefined };
  let inflight: Promise<Result<void, DenialError>> | undefined;

  const refreshDue = (): boolean =>
    state.lastRefreshAt === undefined || clock.now() - state.lastRefreshAt >= minRefreshIntervalMs;

  const fetchKeySet = async (): Promise<Result<ParsedKeySet, DenialError>> => {
    logger.debug({ jwksUri }, 'Refreshing key set');

    try {
      const response = await httpClient.getJson({ url: jwksUri });
      if (response.isErr()) {
        return err(
          createDenial(
            'UPSTREAM_FETCH_FAILED',
            `Failed to fetch key set: ${response.error.message}`,
            response.error
          )
        );
      }
      return await parseKeySet(response.value.body);
    } catch (error) {
      return err(createDenial('UPSTREAM_FETCH_FAILED', 'Failed to fetch key set', error));
    }
  };

  const runRefresh = async (): Promise<Result<void, DenialError>> => {
    const fetched = await fetchKeySet();

    if (fetched.isErr()) {
      logger.warn({ jwksUri, reason: fetched.error.message }, 'Key set refresh failed');
      return err(fetched.error);
    }

    for (const skipped of fetched.value.skipped) {
      logger.warn({ keyId: skipped.keyId, reason: skipped.reason }, 'Ignoring key set entry');
    }

    state = { keys: fetched.value.keys, lastRefreshAt: clock.now() };

    logger.debug({ keyIds: [...state.keys.keys()] }, 'Key set refreshed');
    return ok(undefined);
  };

  const refresh = (): Promise<Result<void, DenialError>> => {
    if (inflight === undefined) {
      inflight = runRefresh().finally(() => {
        inflight = undefined;
      });
    }
    return inflight;
  };

  const lookup = async (keyId: string): Promise<Result<KeyRecord, DenialError>> => {
    const cached = state.keys.get(keyId);
    if (cached !== undefined) {
      return ok(cached);
    }

    if (inflight === undefined && !refreshDue()) {
      return err(
        createDenial('KEY_NOT_FOUND', `Key '${keyId}' is not cached and a refresh is not due yet`)
      );
    }

    const refreshed = await refresh();
    if (refreshed.isErr()) {
      return err(refreshed.error);
    }

    const fresh = state.keys.get(keyId);
    if (fresh === undefined) {
      return err(createDenial('KEY_NOT_FOUND', `Key '${keyId}' is not in the key set`));
    }

    return ok(fresh);
  };

  const snapshot = (): KeyStoreSnapshot => ({
    keyIds: [...state.keys.keys()],
    lastRefreshAt: state.lastRefreshAt,
    refreshing: inflight !== undefined,
  });

  return {
    lookup,
    snapshot,
  };
};
