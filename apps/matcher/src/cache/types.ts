import type { MatchVerdict } from '../validator/types'

/**
 * One cached lookup result. Owned by the cache; callers get frozen copies
 * and replace entries through store(), never by editing them.
 */
export interface CacheEntry {
  /** Canonical reference */
  readonly key: string
  readonly storeId: string
  readonly verdict: MatchVerdict
  /** Epoch milliseconds */
  readonly fetchedAt: number
  /** Epoch milliseconds; the entry is served only while now < expiresAt */
  readonly expiresAt: number
}

export interface CacheStats {
  storeId: string
  total: number
  found: number
  notFound: number
  expired: number
  hits: number
  misses: number
}

export interface LoadReport {
  storeId: string
  loaded: number
  dropped: number
  purged: number
}
