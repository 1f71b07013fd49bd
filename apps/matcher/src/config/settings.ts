/**
 * Engine configuration
 *
 * Every tunable of the matching engine comes from the environment (or an
 * explicit object in tests); components receive values through their
 * constructor options and never read process.env themselves.
 */

import { z } from 'zod'

const DAY_MS = 24 * 60 * 60 * 1000

const engineConfigSchema = z
  .object({
    MATCHER_TTL_FOUND_DAYS: z.coerce.number().int().positive().default(10),
    MATCHER_TTL_NOT_FOUND_DAYS: z.coerce.number().int().positive().default(4),
    MATCHER_MIN_GAP_SECONDS: z.coerce.number().nonnegative().default(7.5),
    MATCHER_CIRCUIT_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
    MATCHER_WINDOW_SIZE: z.coerce.number().int().positive().default(20),
    MATCHER_ACCEPT_THRESHOLD: z.coerce.number().min(0).max(1).default(0.65),
    MATCHER_JITTER_MIN_SECONDS: z.coerce.number().nonnegative().default(0.7),
    MATCHER_JITTER_MAX_SECONDS: z.coerce.number().nonnegative().default(1.5),
    MATCHER_CACHE_DIR: z.string().min(1).default('.cache'),
    MATCHER_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(35_000),
  })
  .refine((env) => env.MATCHER_JITTER_MIN_SECONDS <= env.MATCHER_JITTER_MAX_SECONDS, {
    message: 'MATCHER_JITTER_MIN_SECONDS must not exceed MATCHER_JITTER_MAX_SECONDS',
    path: ['MATCHER_JITTER_MIN_SECONDS'],
  })

export interface EngineConfig {
  ttlFoundDays: number
  ttlNotFoundDays: number
  minGapSeconds: number
  circuitThreshold: number
  windowSize: number
  acceptThreshold: number
  jitterMinSeconds: number
  jitterMaxSeconds: number
  cacheDir: string
  fetchTimeoutMs: number
}

/**
 * Validate and load the engine configuration.
 * Empty strings count as unset so `FOO=` in an env file falls back to the default.
 *
 * @throws ZodError when a value is present but invalid
 */
export function loadEngineConfig(
  env: Record<string, string | undefined> = process.env
): EngineConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  )
  const parsed = engineConfigSchema.parse(present)

  return {
    ttlFoundDays: parsed.MATCHER_TTL_FOUND_DAYS,
    ttlNotFoundDays: parsed.MATCHER_TTL_NOT_FOUND_DAYS,
    minGapSeconds: parsed.MATCHER_MIN_GAP_SECONDS,
    circuitThreshold: parsed.MATCHER_CIRCUIT_THRESHOLD,
    windowSize: parsed.MATCHER_WINDOW_SIZE,
    acceptThreshold: parsed.MATCHER_ACCEPT_THRESHOLD,
    jitterMinSeconds: parsed.MATCHER_JITTER_MIN_SECONDS,
    jitterMaxSeconds: parsed.MATCHER_JITTER_MAX_SECONDS,
    cacheDir: parsed.MATCHER_CACHE_DIR,
    fetchTimeoutMs: parsed.MATCHER_FETCH_TIMEOUT_MS,
  }
}

export function daysToMs(days: number): number {
  return days * DAY_MS
}
