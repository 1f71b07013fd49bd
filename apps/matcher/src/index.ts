/**
 * @refwatch/matcher
 *
 * Reference matching engine for competitor price comparison: feed parsing,
 * match scoring, per-store result caching and adaptive request pacing.
 */

export * from '@refwatch/reference'
export * from './validator'
export * from './cache'
export * from './limiter'
export * from './feed'
export * from './signals'
export * from './fetch'
export * from './stores'
export * from './pipeline'
export * from './report'
export { loadEngineConfig, daysToMs } from './config/settings'
export type { EngineConfig } from './config/settings'
export { loggers, rootLogger } from './config/logger'
export {
  classifyError,
  errorLogMeta,
  ERROR_CODES,
  MatcherError,
  InputError,
  FeedError,
  StoreDefinitionError,
  StoreFetchError,
  SignalError,
  StorageError,
  ThrottleViolation,
} from './errors'
export type { ClassifiedError, ErrorCategory, ErrorCode } from './errors'
