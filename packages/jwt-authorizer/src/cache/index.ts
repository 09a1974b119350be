export { createKeyStore } from './key-store.js';
export { parseKeySet } from './key-set.js';
export type { ParsedKeySet, SkippedKey } from './key-set.js';
export type { KeyStore, KeyStoreOptions, KeyStoreSnapshot } from './types.js';
