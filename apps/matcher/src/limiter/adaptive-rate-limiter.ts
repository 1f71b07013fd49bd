/**
 * Adaptive Rate Limiter
 *
 * Single choke point for outbound requests to one store. Enforces a minimum
 * gap between request starts and doubles it while the recent failure rate is
 * above the circuit threshold.
 *
 * Modes:
 *   NORMAL -> SLOW  failure fraction of the outcome window > threshold
 *   SLOW -> NORMAL  failure fraction back at or below the threshold
 *
 * The mode is re-evaluated on every record(), never on a timer.
 *
 * Concurrent acquire() calls are queued and granted one at a time, so two
 * callers can never both pass having each satisfied the gap only on its own.
 */

import { setTimeout as delay } from 'timers/promises'
import { loggers } from '../config/logger'
import type { ILogger } from '../config/logger'
import { errorLogMeta, ThrottleViolation } from '../errors'
import { RingBuffer } from './ring-buffer'

export type LimiterMode = 'NORMAL' | 'SLOW'

export interface AdaptiveRateLimiterOptions {
  minGapSeconds?: number
  windowSize?: number
  circuitThreshold?: number
  jitterMinSeconds?: number
  jitterMaxSeconds?: number
  /** Gap multiplier while in SLOW mode */
  slowModeMultiplier?: number
  /** Epoch milliseconds */
  now?: () => number
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  /** Uniform [0, 1) */
  random?: () => number
  logger?: ILogger
  /** Included in every log event, usually the store id */
  name?: string
}

export interface RateLimiterStats {
  minGapSeconds: number
  /** Gap currently enforced, including the SLOW multiplier */
  requiredGapSeconds: number
  slowMode: boolean
  mode: LimiterMode
  /** Failure fraction over the outcomes currently held */
  recentFailRate: number
  windowSize: number
  samples: number
}

export const DEFAULT_LIMITER_SETTINGS = {
  minGapSeconds: 7.5,
  windowSize: 20,
  circuitThreshold: 0.3,
  jitterMinSeconds: 0.7,
  jitterMaxSeconds: 1.5,
  slowModeMultiplier: 2,
} as const

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal })
}

export class AdaptiveRateLimiter {
  private readonly minGapMs: number
  private readonly circuitThreshold: number
  private readonly jitterMinMs: number
  private readonly jitterMaxMs: number
  private readonly slowModeMultiplier: number
  private readonly now: () => number
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly random: () => number
  private readonly log: ILogger
  private readonly name: string | undefined

  private readonly outcomes: RingBuffer<boolean>
  private lastRequestAt: number | null = null
  private slowMode = false
  /** Grants handed out by acquire() and not yet matched by record() */
  private outstanding = 0
  private queue: Promise<void> = Promise.resolve()

  constructor(options: AdaptiveRateLimiterOptions = {}) {
    const settings = DEFAULT_LIMITER_SETTINGS
    this.minGapMs = (options.minGapSeconds ?? settings.minGapSeconds) * 1000
    this.circuitThreshold = options.circuitThreshold ?? settings.circuitThreshold
    this.jitterMinMs = (options.jitterMinSeconds ?? settings.jitterMinSeconds) * 1000
    this.jitterMaxMs = (options.jitterMaxSeconds ?? settings.jitterMaxSeconds) * 1000
    this.slowModeMultiplier = options.slowModeMultiplier ?? settings.slowModeMultiplier
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
    this.random = options.random ?? Math.random
    this.name = options.name
    this.log = options.logger ?? loggers.limiter
    this.outcomes = new RingBuffer<boolean>(options.windowSize ?? settings.windowSize)

    if (this.jitterMinMs > this.jitterMaxMs) {
      throw new RangeError('jitterMinSeconds must not exceed jitterMaxSeconds')
    }
  }

  /**
   * Wait until the next request may start, then claim the slot.
   * An aborted wait rejects and leaves the limiter state untouched.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.queue.then(() => this.waitForSlot(signal))
    // Later callers only wait for this turn to finish; its error belongs to this caller.
    const settled = (): void => undefined
    this.queue = turn.then(settled, settled)
    return turn
  }

  /**
   * Report the outcome of a request started after acquire().
   */
  record(success: boolean): void {
    if (this.outstanding === 0) {
      const violation = new ThrottleViolation('record() called without a preceding acquire()', {
        limiter: this.name,
      })
      this.log.warn('LIMITER_ACQUIRE_BYPASSED', errorLogMeta(violation))
    } else {
      this.outstanding--
    }

    this.outcomes.push(success)
    this.evaluate()
  }

  /**
   * Hand back a slot from acquire() without an outcome, for requests the
   * caller cancelled. The window is unchanged.
   */
  release(): void {
    if (this.outstanding > 0) this.outstanding--
  }

  stats(): RateLimiterStats {
    return {
      minGapSeconds: this.minGapMs / 1000,
      requiredGapSeconds: this.requiredGapMs() / 1000,
      slowMode: this.slowMode,
      mode: this.slowMode ? 'SLOW' : 'NORMAL',
      recentFailRate: this.failRate(),
      windowSize: this.outcomes.capacity,
      samples: this.outcomes.size,
    }
  }

  get mode(): LimiterMode {
    return this.slowMode ? 'SLOW' : 'NORMAL'
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────────

  private async waitForSlot(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()

    while (this.lastRequestAt !== null) {
      const requiredMs = this.requiredGapMs()
      const elapsedMs = this.now() - this.lastRequestAt
      if (elapsedMs >= requiredMs) break

      const jitterMs = this.jitterMinMs + this.random() * (this.jitterMaxMs - this.jitterMinMs)
      const waitMs = requiredMs - elapsedMs + jitterMs
      this.log.debug('LIMITER_WAIT', {
        limiter: this.name,
        waitMs: Math.round(waitMs),
        mode: this.mode,
      })
      await this.sleep(waitMs, signal)
      signal?.throwIfAborted()
    }

    this.lastRequestAt = this.now()
    this.outstanding++
  }

  private requiredGapMs(): number {
    return this.slowMode ? this.minGapMs * this.slowModeMultiplier : this.minGapMs
  }

  private failRate(): number {
    const samples = this.outcomes.size
    if (samples === 0) return 0
    return this.outcomes.count((success) => !success) / samples
  }

  private evaluate(): void {
    const failRate = this.failRate()
    const shouldSlow = failRate > this.circuitThreshold
    if (shouldSlow === this.slowMode) return

    this.slowMode = shouldSlow
    const meta = {
      limiter: this.name,
      recentFailRate: Math.round(failRate * 10_000) / 10_000,
      threshold: this.circuitThreshold,
      requiredGapSeconds: this.requiredGapMs() / 1000,
    }
    if (shouldSlow) {
      this.log.warn('LIMITER_SLOW_MODE_ENTERED', meta)
    } else {
      this.log.info('LIMITER_SLOW_MODE_EXITED', meta)
    }
  }
}
