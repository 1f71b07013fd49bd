/**
 * Persisted cache format
 *
 * One JSON file per store:
 *
 *   {
 *     "version": 1,
 *     "storeId": "moto-parts",
 *     "entries": {
 *       "PHF1595": { "verdict": { ... }, "fetchedAt": 1760000000000, "expiresAt": 1760864000000 }
 *     }
 *   }
 *
 * Records are validated one by one so a single damaged record never costs
 * the rest of the file.
 */

import { z } from 'zod'
import { canonicalize } from '@refwatch/reference'
import { CONFIDENCE_BANDS, MATCH_TYPES } from '../validator/types'
import type { MatchVerdict } from '../validator/types'
import { isAccepted } from '../validator/verdict'
import type { CacheEntry } from './types'

export const CACHE_FILE_VERSION = 1

const verdictSchema = z
  .object({
    isValid: z.boolean(),
    confidence: z.number().min(0).max(1),
    matchType: z.enum(MATCH_TYPES),
    matchedParts: z.array(z.string()),
    reason: z.string(),
    price: z.number().finite().nonnegative().optional(),
    currency: z.string().optional(),
    url: z.string().optional(),
  })
  .refine(
    (verdict) => {
      const band = CONFIDENCE_BANDS[verdict.matchType]
      return verdict.confidence >= band.min && verdict.confidence <= band.max
    },
    { message: 'confidence outside the band of its match type' }
  )
  .refine((verdict) => !(verdict.isValid && verdict.matchType === 'NO_MATCH'), {
    message: 'NO_MATCH verdict marked valid',
  })

const recordSchema = z
  .object({
    verdict: verdictSchema,
    fetchedAt: z.number().int().nonnegative(),
    expiresAt: z.number().int().nonnegative(),
  })
  .refine((record) => record.expiresAt > record.fetchedAt, {
    message: 'expiresAt must be after fetchedAt',
  })

const fileSchema = z.object({
  version: z.literal(CACHE_FILE_VERSION),
  storeId: z.string().optional(),
  entries: z.record(z.unknown()),
})

export type PersistedRecord = z.infer<typeof recordSchema>

export type ParsedCacheFile =
  | { ok: true; records: Array<[string, unknown]> }
  | { ok: false; error: string }

/**
 * Parse the file envelope. Individual records are left for parseRecord().
 */
export function parseCacheFile(raw: string): ParsedCacheFile {
  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) }
  }

  const parsed = fileSchema.safeParse(json)
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((issue) => issue.message).join('; ') }
  }

  return { ok: true, records: Object.entries(parsed.data.entries) }
}

/** What a record must agree with under the current configuration */
export interface RecordPolicy {
  acceptThreshold: number
  ttlFoundMs: number
  ttlNotFoundMs: number
}

/**
 * Validate one persisted record. Returns null when the record or its key is
 * unusable, or when isValid disagrees with the accept threshold.
 *
 * A lifetime longer than the configured TTL for the verdict is cut back to
 * fetchedAt + TTL.
 */
export function parseRecord(
  storeId: string,
  key: string,
  value: unknown,
  policy: RecordPolicy
): CacheEntry | null {
  if (!key || canonicalize(key) !== key) return null

  const parsed = recordSchema.safeParse(value)
  if (!parsed.success) return null

  const { verdict, fetchedAt } = parsed.data
  if (verdict.isValid !== isAccepted(verdict.matchType, verdict.confidence, policy.acceptThreshold)) {
    return null
  }

  const ttl = verdict.isValid ? policy.ttlFoundMs : policy.ttlNotFoundMs
  const expiresAt = Math.min(parsed.data.expiresAt, fetchedAt + ttl)
  const restored: MatchVerdict = Object.freeze({
    isValid: verdict.isValid,
    confidence: verdict.confidence,
    matchType: verdict.matchType,
    matchedParts: Object.freeze([...verdict.matchedParts]),
    reason: verdict.reason,
    ...(verdict.price !== undefined ? { price: verdict.price } : {}),
    ...(verdict.currency ? { currency: verdict.currency } : {}),
    ...(verdict.url ? { url: verdict.url } : {}),
  })

  return Object.freeze({ key, storeId, verdict: restored, fetchedAt, expiresAt })
}

export function serializeEntries(storeId: string, entries: Iterable<CacheEntry>): string {
  const records: Record<string, PersistedRecord> = {}
  const sorted = [...entries].sort((a, b) => a.key.localeCompare(b.key))

  for (const entry of sorted) {
    records[entry.key] = {
      verdict: { ...entry.verdict, matchedParts: [...entry.verdict.matchedParts] },
      fetchedAt: entry.fetchedAt,
      expiresAt: entry.expiresAt,
    }
  }

  return `${JSON.stringify({ version: CACHE_FILE_VERSION, storeId, entries: records }, null, 2)}\n`
}
