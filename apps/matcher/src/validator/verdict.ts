import { CONFIDENCE_BANDS, DEFAULT_ACCEPT_THRESHOLD } from './types'
import type { MatchType, MatchVerdict } from './types'

export interface VerdictInput {
  matchType: MatchType
  confidence: number
  matchedParts?: Iterable<string>
  reason: string
  price?: number
  currency?: string
  url?: string
}

function roundConfidence(value: number): number {
  return Math.round(value * 10_000) / 10_000
}

/**
 * Clamp a confidence into the band of its match type.
 */
export function clampToBand(matchType: MatchType, confidence: number): number {
  const band = CONFIDENCE_BANDS[matchType]
  if (!Number.isFinite(confidence)) return band.min
  return roundConfidence(Math.min(band.max, Math.max(band.min, confidence)))
}

export function isAccepted(
  matchType: MatchType,
  confidence: number,
  acceptThreshold: number = DEFAULT_ACCEPT_THRESHOLD
): boolean {
  return matchType !== 'NO_MATCH' && confidence >= acceptThreshold
}

/**
 * Build a frozen verdict. Confidence is forced into the band of the match
 * type and isValid is derived, never passed in.
 */
export function createVerdict(
  input: VerdictInput,
  acceptThreshold: number = DEFAULT_ACCEPT_THRESHOLD
): MatchVerdict {
  const confidence = clampToBand(input.matchType, input.confidence)
  const verdict: MatchVerdict = {
    isValid: isAccepted(input.matchType, confidence, acceptThreshold),
    confidence,
    matchType: input.matchType,
    matchedParts: Object.freeze([...new Set(input.matchedParts ?? [])]),
    reason: input.reason,
    ...(input.price !== undefined ? { price: input.price } : {}),
    ...(input.currency ? { currency: input.currency } : {}),
    ...(input.url ? { url: input.url } : {}),
  }
  return Object.freeze(verdict)
}

export function noMatch(reason: string, extras: Pick<VerdictInput, 'url' | 'price' | 'currency'> = {}): MatchVerdict {
  return createVerdict({ matchType: 'NO_MATCH', confidence: 0, reason, ...extras })
}
