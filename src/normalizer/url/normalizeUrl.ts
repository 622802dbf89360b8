import { resolvePolicy } from '../../policy.js';
import type { NormalizationConfig, NormalizationPolicy } from '../../types.js';
import { cleanupUrl } from './cleanupUrl.js';
import { normalizeFragment, normalizeScheme, normalizeUserinfo } from './components.js';
import { normalizeHost } from './normalizeHost.js';
import { normalizePath } from './normalizePath.js';
import { normalizePort } from './normalizePort.js';
import { normalizeQuery } from './normalizeQuery.js';
import { provideScheme } from './provideScheme.js';
import { decomposeUrl, reconstructUrl } from './urlParts.js';

/**
 * Reduces a URL to its canonical form. Permissive by intent: browser-style
 * cleanup of noisy input rather than rejection, and never throws for
 * malformed URLs. Idempotent for every input.
 *
 * @example
 * normalizeUrl('HTTP://Example.COM:80/a/./b/../c?b=2&a=1');
 * // => 'http://example.com/a/c?a=1&b=2'
 */
export function normalizeUrl(url: string, config: NormalizationConfig = {}): string {
  if (!url) {
    return url;
  }

  return normalizeWithPolicy(url, resolvePolicy(config));
}

/** Pipeline body for callers holding an already-validated policy. */
export function normalizeWithPolicy(url: string, policy: NormalizationPolicy): string {
  const trimmed = url.trim();
  if (!trimmed) {
    return trimmed;
  }

  const withScheme = provideScheme(trimmed, policy.defaultScheme, {
    inferFromPort: policy.inferSchemeFromPort,
  });
  const parts = decomposeUrl(cleanupUrl(withScheme));
  const scheme = normalizeScheme(parts.scheme);

  return reconstructUrl({
    scheme,
    userinfo: normalizeUserinfo(parts.userinfo),
    host: normalizeHost(parts.host),
    port: normalizePort(parts.port, scheme),
    path: normalizePath(parts.path, scheme, policy.charset),
    query: normalizeQuery(parts.query, { ...policy, stripTracking: true }),
    fragment: normalizeFragment(parts.fragment, policy.charset),
  });
}
