/**
 * Match Verdict Types
 *
 * A verdict is the scored outcome of comparing one reference against one
 * candidate page. Match type and confidence are derived together: every
 * match type owns a fixed confidence band and a verdict never carries a
 * confidence outside the band of its type.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Match Types
// ═══════════════════════════════════════════════════════════════════════════════

export type MatchType =
  | 'SKU_MATCH' // Page SKU equals the reference
  | 'EXACT_MATCH' // Reference inside a declared code or the title
  | 'STRONG_MATCH' // Reference in the URL path, or every composite segment present
  | 'PARTIAL_MATCH' // Legacy persisted verdicts only; score() never emits it
  | 'FUZZY_MATCH' // Reference only in body text, or some composite segments
  | 'NO_MATCH'

export const MATCH_TYPES = [
  'SKU_MATCH',
  'EXACT_MATCH',
  'STRONG_MATCH',
  'PARTIAL_MATCH',
  'FUZZY_MATCH',
  'NO_MATCH',
] as const satisfies readonly MatchType[]

export interface ConfidenceBand {
  readonly min: number
  readonly max: number
}

/**
 * Confidence band per match type, highest first. Band ordering is what keeps
 * a SKU match above any fuzzy match.
 */
export const CONFIDENCE_BANDS: Readonly<Record<MatchType, ConfidenceBand>> = {
  SKU_MATCH: { min: 1.0, max: 1.0 },
  EXACT_MATCH: { min: 0.95, max: 0.95 },
  STRONG_MATCH: { min: 0.85, max: 0.9 },
  FUZZY_MATCH: { min: 0.6, max: 0.75 },
  PARTIAL_MATCH: { min: 0.3, max: 0.6 },
  NO_MATCH: { min: 0, max: 0 },
}

export const DEFAULT_ACCEPT_THRESHOLD = 0.65

// ═══════════════════════════════════════════════════════════════════════════════
// Verdict
// ═══════════════════════════════════════════════════════════════════════════════

export interface MatchVerdict {
  /** confidence >= accept threshold and matchType !== 'NO_MATCH' */
  readonly isValid: boolean
  readonly confidence: number
  readonly matchType: MatchType
  /** Reference parts that satisfied the winning rule, without duplicates */
  readonly matchedParts: readonly string[]
  readonly reason: string
  /** Price shown on the candidate page, in major units (e.g. 120.5 = €120.50) */
  readonly price?: number
  readonly currency?: string
  readonly url?: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Page Signals
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Everything the scoring rules look at, extracted from one fetched page.
 */
export interface PageSignals {
  sku?: string
  title: string
  url: string
  metaCodes: readonly string[]
  bodyText: string
  price?: number
  currency?: string
}

/**
 * Signals as a scraper may hand them over: any field can be missing.
 * Missing strings become "" and missing codes an empty list.
 */
export interface PageSignalsInput {
  sku?: string | null
  title?: string | null
  url?: string | null
  metaCodes?: Iterable<string> | null
  bodyText?: string | null
  price?: number | null
  currency?: string | null
}
