import { filterParameters } from '../filterParameters.js';
import type { HeaderMap, NormalizationConfig } from '../../types.js';
import { compareCodeUnits } from '../../util/compare.js';

export type HeaderOptions = Pick<NormalizationConfig, 'ignoredParameters' | 'redactIgnored'>;

/**
 * Lowercases header names, filters ignored headers, sorts the rest by name
 * and treats comma-separated values as unordered sets:
 * `Accept: Text/HTML, application/json` becomes `application/json, text/html`.
 * Headers whose names differ only in case are joined into one list.
 */
export function normalizeHeaders(
  headers: HeaderMap | null | undefined,
  options: HeaderOptions = {},
): HeaderMap {
  if (!headers) {
    return {};
  }

  const merged = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    const key = name.toLowerCase();
    const previous = merged.get(key);
    merged.set(key, previous === undefined ? value : `${previous},${value}`);
  }

  const entries = [...merged].sort(([a], [b]) => compareCodeUnits(a, b));
  const filtered = filterParameters(
    entries,
    {
      ignoredParameters: new Set(options.ignoredParameters ?? []),
      redactIgnored: options.redactIgnored ?? false,
    },
    { caseInsensitive: true },
  );

  return Object.fromEntries(
    filtered.map(([name, value]) => [name, value.includes(',') ? normalizeValueList(value) : value]),
  );
}

function normalizeValueList(value: string): string {
  return value
    .toLowerCase()
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .sort(compareCodeUnits)
    .join(', ');
}

/** Case-insensitive header lookup. */
export function findHeader(headers: HeaderMap | null | undefined, name: string): string | undefined {
  if (!headers) {
    return undefined;
  }

  const wanted = name.toLowerCase();
  const match = Object.entries(headers).find(([key]) => key.toLowerCase() === wanted);
  return match?.[1];
}
