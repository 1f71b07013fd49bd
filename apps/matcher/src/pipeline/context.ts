/**
 * Matcher context
 *
 * Everything one run shares, built once from the engine configuration and
 * passed down explicitly: the cache handle, one rate limiter per store and
 * a fetcher per store gated by that limiter.
 */

import { resolve } from 'path'
import { ResultCache } from '../cache/result-cache'
import { daysToMs } from '../config/settings'
import type { EngineConfig } from '../config/settings'
import type { ILogger } from '../config/logger'
import { HttpFetcher } from '../fetch/http-fetcher'
import type { Fetcher, RequestGate } from '../fetch/types'
import { AdaptiveRateLimiter } from '../limiter/adaptive-rate-limiter'
import { LookupRunner } from './lookup-runner'

export interface MatcherContextOptions {
  /** Relative cacheDir values resolve against this directory */
  cwd?: string
  now?: () => number
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  random?: () => number
  /** Replaces the HTTP fetcher; it must pass every request through the gate */
  createFetcher?: (storeId: string, gate: RequestGate) => Fetcher
  logger?: ILogger
}

export interface MatcherContext {
  config: EngineConfig
  cache: ResultCache
  runner: LookupRunner
  limiterFor(storeId: string): AdaptiveRateLimiter
  fetcherFor(storeId: string): Fetcher
}

export function createMatcherContext(
  config: EngineConfig,
  options: MatcherContextOptions = {}
): MatcherContext {
  const cache = new ResultCache({
    directory: resolve(options.cwd ?? process.cwd(), config.cacheDir),
    ttlFoundMs: daysToMs(config.ttlFoundDays),
    ttlNotFoundMs: daysToMs(config.ttlNotFoundDays),
    acceptThreshold: config.acceptThreshold,
    now: options.now,
    logger: options.logger,
  })

  const limiters = new Map<string, AdaptiveRateLimiter>()
  const fetchers = new Map<string, Fetcher>()

  const limiterFor = (storeId: string): AdaptiveRateLimiter => {
    let limiter = limiters.get(storeId)
    if (!limiter) {
      limiter = new AdaptiveRateLimiter({
        minGapSeconds: config.minGapSeconds,
        windowSize: config.windowSize,
        circuitThreshold: config.circuitThreshold,
        jitterMinSeconds: config.jitterMinSeconds,
        jitterMaxSeconds: config.jitterMaxSeconds,
        now: options.now,
        sleep: options.sleep,
        random: options.random,
        logger: options.logger,
        name: storeId,
      })
      limiters.set(storeId, limiter)
    }
    return limiter
  }

  const fetcherFor = (storeId: string): Fetcher => {
    let fetcher = fetchers.get(storeId)
    if (!fetcher) {
      const gate = limiterFor(storeId)
      fetcher = options.createFetcher
        ? options.createFetcher(storeId, gate)
        : new HttpFetcher({ gate, timeoutMs: config.fetchTimeoutMs, logger: options.logger })
      fetchers.set(storeId, fetcher)
    }
    return fetcher
  }

  const runner = new LookupRunner({
    cache,
    fetcherFor,
    acceptThreshold: config.acceptThreshold,
    now: options.now,
    logger: options.logger,
  })

  return { config, cache, runner, limiterFor, fetcherFor }
}
