import { createHash } from 'node:crypto';

import type { NormalizationConfig, RequestDescriptor } from '../../types.js';
import { normalizeRequest } from './normalizeRequest.js';

/**
 * Hex SHA-256 of a normalized request, for use as a cache key. Each part is
 * length-prefixed so no two distinct requests can concatenate to the same input.
 */
export function createRequestKey(request: RequestDescriptor, config: NormalizationConfig = {}): string {
  const normalized = normalizeRequest(request.url, request.headers, request.body, config);
  const method = (request.method ?? 'GET').trim().toUpperCase();

  const hash = createHash('sha256');
  for (const part of [
    Buffer.from(method, 'utf8'),
    Buffer.from(normalized.url, 'utf8'),
    Buffer.from(JSON.stringify(Object.entries(normalized.headers)), 'utf8'),
    normalized.body,
  ]) {
    hash.update(`${part.byteLength}:`);
    hash.update(part);
  }

  return hash.digest('hex');
}
