import type { Result } from 'neverthrow';
import type { Logger } from 'pino';
import type { Clock, DenialError, KeyRecord } from '../types.js';
import type { HttpClient } from '../http/types.js';

/**
 * Concurrent store of verification keys backed by a remote key set.
 */
export interface KeyStore {
  /**
   * Resolves a key by identifier. A miss triggers at most one refresh of the
   * key set, subject to the minimum refresh interval.
   * @param keyId - The `kid` from the token header
   * @returns Result with the key or a KEY_NOT_FOUND / UPSTREAM_FETCH_FAILED denial
   */
  readonly lookup: (keyId: string) => Promise<Result<KeyRecord, DenialError>>;

  /**
   * Returns the current cache contents for diagnostics.
   */
  readonly snapshot: () => KeyStoreSnapshot;
}

/**
 * Point-in-time view of the key store.
 */
export interface KeyStoreSnapshot {
  /** Identifiers of the cached keys */
  readonly keyIds: readonly string[];
  /** Epoch milliseconds of the last completed refresh, if any */
  readonly lastRefreshAt: number | undefined;
  /** Whether a refresh is currently in flight */
  readonly refreshing: boolean;
}

/**
 * Options for creating a key store.
 */
export interface KeyStoreOptions {
  /** URL of the JSON Web Key Set document */
  readonly jwksUri: string;
  /** Minimum time between two completed refreshes, in milliseconds */
  readonly minRefreshIntervalMs: number;
  /** HTTP client used to download the key set (default: createFetchClient()) */
  readonly httpClient?: HttpClient;
  /** Time source for the rate limit (default: system clock) */
  readonly clock?: Clock;
  /** Logger for refresh diagnostics (default: silent) */
  readonly logger?: Logger;
}
