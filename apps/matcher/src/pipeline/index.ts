export { LookupRunner } from './lookup-runner'
export type { LookupRunnerOptions } from './lookup-runner'
export { createMatcherContext } from './context'
export type { MatcherContext, MatcherContextOptions } from './context'
export { recordStoreRunCompleted, summarizeOutcomes } from './metrics'
export type {
  LookupOptions,
  LookupOutcome,
  LookupStatus,
  ProductLookup,
  StoreRunMetrics,
  StoreRunResult,
} from './types'
