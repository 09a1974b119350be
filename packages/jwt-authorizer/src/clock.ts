import type { Clock } from './types.js';

/** Wall clock backed by Date.now() */
export const systemClock: Clock = {
  now: () => Date.now(),
};
