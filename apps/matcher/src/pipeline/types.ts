import type { CacheEntry } from '../cache/types'
import type { ClassifiedError } from '../errors'
import type { FeedProduct } from '../feed/parser'

interface OutcomeBase {
  storeId: string
  /** Canonical reference, "" when the product was skipped for having none */
  reference: string
}

/**
 * What one lookup of one reference on one store came to.
 *   skipped  reference not searchable; nothing fetched or cached
 *   cached   unexpired verdict served from the cache
 *   fetched  page fetched and scored, verdict cached
 *   failed   store could not answer; nothing cached, next run retries
 */
export type LookupOutcome =
  | (OutcomeBase & { status: 'skipped'; reason: string })
  | (OutcomeBase & { status: 'cached'; entry: CacheEntry })
  | (OutcomeBase & { status: 'fetched'; entry: CacheEntry })
  | (OutcomeBase & { status: 'failed'; error: ClassifiedError })

export type LookupStatus = LookupOutcome['status']

export interface LookupOptions {
  /** Ignore cached verdicts and fetch again */
  refresh?: boolean
  /** Neither read nor write the cache; verdicts live only in this run's outcomes */
  noCache?: boolean
  signal?: AbortSignal
}

export interface ProductLookup {
  product: FeedProduct
  outcome: LookupOutcome
}

export interface StoreRunMetrics {
  storeId: string
  products: number
  skipped: number
  cached: number
  fetched: number
  failed: number
  /** Verdicts (cached or fetched) that were accepted */
  found: number
  notFound: number
  /** failed / (fetched + failed) */
  failureRate: number
  durationMs: number
}

export interface StoreRunResult {
  storeId: string
  lookups: ProductLookup[]
  metrics: StoreRunMetrics
}
