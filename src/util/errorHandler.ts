import { NormalizerError, ensureNormalizerError, type ErrorKind } from '../errors.js';

export interface ErrorContext extends Record<string, unknown> {
  command?: string;
}

/**
 * Writes `Error: [kind] message (key="value" …)` to stderr and returns the
 * error as a NormalizerError. Errors that are not NormalizerErrors take
 * `defaultKind`.
 */
export function reportNormalizerError(
  error: unknown,
  context: ErrorContext = {},
  defaultKind: ErrorKind = 'internal',
): NormalizerError {
  const normalizerError = ensureNormalizerError(error, defaultKind);

  console.error(
    buildLogMessage(normalizerError, {
      ...(normalizerError.details ?? {}),
      ...context,
    }),
  );

  return normalizerError;
}

function buildLogMessage(error: NormalizerError, details: Record<string, unknown>): string {
  const parts = ['Error:', `[${error.kind}]`, error.message];
  const contextSuffix = serialiseDetails(details);

  if (contextSuffix) {
    parts.push(`(${contextSuffix})`);
  }

  return parts.join(' ');
}

function serialiseDetails(details: Record<string, unknown>): string | undefined {
  const entries = Object.entries(details).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return undefined;
  }

  entries.sort(([a], [b]) => a.localeCompare(b));
  return entries.map(([key, value]) => `${key}=${JSON.stringify(value)}`).join(' ');
}
