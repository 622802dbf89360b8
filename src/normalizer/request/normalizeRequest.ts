import { resolvePolicy } from '../../policy.js';
import type {
  HeaderMap,
  NormalizationConfig,
  NormalizedRequest,
  RequestBody,
} from '../../types.js';
import { normalizeWithPolicy } from '../url/normalizeUrl.js';
import { normalizeBody } from './normalizeBody.js';
import { normalizeHeaders } from './normalizeHeaders.js';

/**
 * Normalizes the URL, headers and body of a request under one policy. With
 * the same ignored parameters applied to all three, requests that differ
 * only in the values of ignored parameters normalize identically.
 */
export function normalizeRequest(
  url: string,
  headers?: HeaderMap | null,
  body?: RequestBody | null,
  config: NormalizationConfig = {},
): NormalizedRequest {
  const policy = resolvePolicy(config);

  return {
    url: normalizeWithPolicy(url, policy),
    headers: normalizeHeaders(headers, policy),
    // Content-Type is read from the caller's headers, before any filtering.
    body: normalizeBody(body, headers, policy),
  };
}
