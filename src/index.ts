export * from './normalizer/index.js';
export { DEFAULT_POLICY, REDACTED, resolvePolicy } from './policy.js';
export { configureLogger, setLoggerInstance, type LoggerLike, type LogLevel } from './logger.js';
export {
  NormalizerError,
  isNormalizerError,
  type ErrorKind,
} from './errors.js';
export type {
  HeaderMap,
  NormalizationConfig,
  NormalizationPolicy,
  NormalizedRequest,
  RequestBody,
  RequestDescriptor,
  UrlParts,
} from './types.js';
