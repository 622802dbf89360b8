import { REDACTED } from '../policy.js';
import type { NormalizationPolicy } from '../types.js';

export type IgnorePolicy = Pick<NormalizationPolicy, 'ignoredParameters' | 'redactIgnored'>;

export interface FilterOptions {
  /** Header names compare case-insensitively; query and body keys do not. */
  caseInsensitive?: boolean;
  /** Maps an entry's key to the name compared against the ignored set. */
  matchKey?: (key: string) => string;
}

/**
 * Drops entries whose key is ignored, or keeps them with their value replaced
 * by the redaction sentinel. The one filter behind query, header and body
 * normalization, so an ignored name behaves the same wherever it appears.
 */
export function filterParameters<V>(
  entries: Iterable<readonly [string, V]>,
  policy: IgnorePolicy,
  options: FilterOptions = {},
): Array<[string, V | typeof REDACTED]> {
  const result: Array<[string, V | typeof REDACTED]> = [];

  if (policy.ignoredParameters.size === 0) {
    for (const [key, value] of entries) {
      result.push([key, value]);
    }
    return result;
  }

  const isIgnored = createIgnoreMatcher(policy.ignoredParameters, options);
  for (const [key, value] of entries) {
    if (!isIgnored(key)) {
      result.push([key, value]);
    } else if (policy.redactIgnored) {
      result.push([key, REDACTED]);
    }
  }

  return result;
}

export function createIgnoreMatcher(
  ignored: ReadonlySet<string>,
  options: FilterOptions = {},
): (key: string) => boolean {
  const { caseInsensitive = false, matchKey = (key: string) => key } = options;

  if (!caseInsensitive) {
    return (key) => ignored.has(matchKey(key));
  }

  const lowered = new Set([...ignored].map((name) => name.toLowerCase()));
  return (key) => lowered.has(matchKey(key).toLowerCase());
}
