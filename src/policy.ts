import iconv from 'iconv-lite';

import { createConfigurationError } from './errors.js';
import type { NormalizationConfig, NormalizationPolicy } from './types.js';

export const REDACTED = 'REDACTED';

export const DEFAULT_POLICY: NormalizationPolicy = Object.freeze({
  charset: 'utf-8',
  defaultScheme: 'https',
  ignoredParameters: new Set<string>(),
  redactIgnored: false,
  sortParameters: true,
  inferSchemeFromPort: false,
});

const ASCII_PROBE = 'azAZ09-._~%/?#&=';
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*$/;

/**
 * Fills in defaults for a partial configuration and rejects values no
 * normalizer could honour. Resolving an already-resolved policy yields an equal one.
 */
export function resolvePolicy(config: NormalizationConfig = {}): NormalizationPolicy {
  const charset = resolveCharset(config.charset ?? DEFAULT_POLICY.charset);
  const defaultScheme = resolveDefaultScheme(config.defaultScheme ?? DEFAULT_POLICY.defaultScheme);

  return {
    charset,
    defaultScheme,
    ignoredParameters: new Set(config.ignoredParameters ?? DEFAULT_POLICY.ignoredParameters),
    redactIgnored: config.redactIgnored ?? DEFAULT_POLICY.redactIgnored,
    sortParameters: config.sortParameters ?? DEFAULT_POLICY.sortParameters,
    inferSchemeFromPort: config.inferSchemeFromPort ?? DEFAULT_POLICY.inferSchemeFromPort,
  };
}

function resolveCharset(value: string): string {
  const charset = value.trim().toLowerCase();
  if (!charset || !iconv.encodingExists(charset)) {
    throw createConfigurationError(`Unsupported charset: ${value}`, { charset: value });
  }

  // Percent-encoding works on bytes; the URL's ASCII must map to itself.
  if (iconv.encode(ASCII_PROBE, charset).toString('latin1') !== ASCII_PROBE) {
    throw createConfigurationError(`Charset is not ASCII-compatible: ${value}`, { charset: value });
  }

  return charset;
}

function resolveDefaultScheme(value: string): string {
  const scheme = value.trim().toLowerCase();
  if (!SCHEME_PATTERN.test(scheme)) {
    throw createConfigurationError(`Invalid default scheme: ${value}`, { defaultScheme: value });
  }

  return scheme;
}
