import { RE2JS } from 're2js';

/** Compiled patterns kept between evaluations, keyed by source */
const MAX_CACHED_PATTERNS = 128;

const cache = new Map<string, RE2JS>();

/**
 * Compiles a pattern with RE2 semantics. Matching runs in time linear in the
 * input, so a pattern applied to a claim cannot stall the process.
 *
 * @throws Error when the pattern is not valid RE2 syntax
 */
export const compileRegex = (pattern: string): RE2JS => {
  const cached = cache.get(pattern);
  if (cached !== undefined) {
    return cached;
  }
  const compiled = RE2JS.compile(pattern);
  if (cache.size >= MAX_CACHED_PATTERNS) {
    cache.clear();
  }
  cache.set(pattern, compiled);
  return compiled;
};

/**
 * True when the pattern matches anywhere in the subject.
 */
export const regexMatches = (pattern: string, subject: string): boolean =>
  compileRegex(pattern).matcher(subject).find();
