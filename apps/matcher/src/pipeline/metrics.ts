/**
 * Run metrics
 *
 * No metrics backend: counters are emitted as structured log events only.
 */

import { loggers } from '../config/logger'
import type { ILogger } from '../config/logger'
import type { LookupOutcome, StoreRunMetrics } from './types'

const FAILURE_RATE_ALERT_THRESHOLD = 0.5
const MIN_ATTEMPTS_FOR_ALERT = 10

export function summarizeOutcomes(
  storeId: string,
  outcomes: readonly LookupOutcome[],
  durationMs: number
): StoreRunMetrics {
  const metrics: StoreRunMetrics = {
    storeId,
    products: outcomes.length,
    skipped: 0,
    cached: 0,
    fetched: 0,
    failed: 0,
    found: 0,
    notFound: 0,
    failureRate: 0,
    durationMs,
  }

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'skipped':
        metrics.skipped++
        break
      case 'failed':
        metrics.failed++
        break
      case 'cached':
      case 'fetched':
        metrics[outcome.status]++
        if (outcome.entry.verdict.isValid) {
          metrics.found++
        } else {
          metrics.notFound++
        }
        break
    }
  }

  const attempts = metrics.fetched + metrics.failed
  metrics.failureRate = attempts > 0 ? Math.round((metrics.failed / attempts) * 10_000) / 10_000 : 0
  return metrics
}

export function recordStoreRunCompleted(metrics: StoreRunMetrics, log: ILogger = loggers.pipeline): void {
  log.info('MATCHER_STORE_RUN_COMPLETED', {
    event_name: 'MATCHER_STORE_RUN_COMPLETED',
    ...metrics,
  })

  const attempts = metrics.fetched + metrics.failed
  if (attempts >= MIN_ATTEMPTS_FOR_ALERT && metrics.failureRate > FAILURE_RATE_ALERT_THRESHOLD) {
    log.warn('MATCHER_ALERT_HIGH_FAILURE_RATE', {
      event_name: 'MATCHER_ALERT_HIGH_FAILURE_RATE',
      storeId: metrics.storeId,
      failureRate: metrics.failureRate,
      attempts,
    })
  }
}
