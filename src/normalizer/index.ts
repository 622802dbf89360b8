export { decomposeUrl, reconstructUrl, splitAuthority } from './url/urlParts.js';
export { DEFAULT_PORTS, defaultPortFor, schemeForPort } from './url/defaultPorts.js';
export { provideScheme, type ProvideSchemeOptions } from './url/provideScheme.js';
export { cleanupUrl } from './url/cleanupUrl.js';
export {
  FRAGMENT_SAFE,
  PATH_SAFE,
  QUERY_KEY_SAFE,
  QUERY_VALUE_SAFE,
  percentDecode,
  requote,
} from './url/requote.js';
export { normalizeFragment, normalizeScheme, normalizeUserinfo } from './url/components.js';
export { normalizeHost } from './url/normalizeHost.js';
export { normalizePort } from './url/normalizePort.js';
export { normalizePath } from './url/normalizePath.js';
export { normalizeQuery, type QueryOptions } from './url/normalizeQuery.js';
export { normalizeUrl, normalizeWithPolicy } from './url/normalizeUrl.js';
export { filterParameters, type FilterOptions, type IgnorePolicy } from './filterParameters.js';
export { findHeader, normalizeHeaders, type HeaderOptions } from './request/normalizeHeaders.js';
export {
  normalizeBody,
  normalizeJsonBody,
  serializeCanonical,
  type BodyOptions,
} from './request/normalizeBody.js';
export { normalizeRequest } from './request/normalizeRequest.js';
export { createRequestKey } from './request/requestKey.js';
export {
  MemoizedNormalizer,
  createMemoizedNormalizer,
  type MemoizeOptions,
} from './memoizedNormalizer.js';
