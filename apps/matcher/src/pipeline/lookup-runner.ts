/**
 * Lookup Runner
 *
 * Orchestrates one reference on one store:
 *   1. Skip references that normalize to nothing searchable
 *   2. Serve an unexpired cached verdict (unless refreshing)
 *   3. Search the store through its paced fetcher
 *   4. Score the candidate page and cache the verdict
 *
 * With noCache the cache is neither read nor written; refresh only skips
 * the read.
 *
 * Steps 2-4 hold the cache's per-(store, reference) lock, and concurrent
 * lookups of the same key share one in-flight promise, so a key is never
 * fetched twice at once.
 */

import { isSearchable } from '@refwatch/reference'
import type { ResultCache } from '../cache/result-cache'
import { loggers } from '../config/logger'
import type { ILogger } from '../config/logger'
import { classifyError, errorLogMeta, SignalError } from '../errors'
import type { FeedProduct } from '../feed/parser'
import type { Fetcher } from '../fetch/types'
import type { StoreAdapter } from '../stores/types'
import { score } from '../validator/score'
import { missingSignalFields } from '../validator/signals'
import { DEFAULT_ACCEPT_THRESHOLD } from '../validator/types'
import { noMatch } from '../validator/verdict'
import { recordStoreRunCompleted, summarizeOutcomes } from './metrics'
import type { LookupOptions, LookupOutcome, ProductLookup, StoreRunResult } from './types'

export interface LookupRunnerOptions {
  cache: ResultCache
  /** Fetcher for one store, paced by that store's limiter */
  fetcherFor: (storeId: string) => Fetcher
  acceptThreshold?: number
  now?: () => number
  logger?: ILogger
}

export class LookupRunner {
  private readonly cache: ResultCache
  private readonly fetcherFor: (storeId: string) => Fetcher
  private readonly acceptThreshold: number
  private readonly now: () => number
  private readonly log: ILogger
  private readonly inflight = new Map<string, Promise<LookupOutcome>>()

  constructor(options: LookupRunnerOptions) {
    this.cache = options.cache
    this.fetcherFor = options.fetcherFor
    this.acceptThreshold = options.acceptThreshold ?? DEFAULT_ACCEPT_THRESHOLD
    this.now = options.now ?? Date.now
    this.log = options.logger ?? loggers.pipeline
  }

  /**
   * Look up one product on one store. Never rejects for store or cache
   * failures; rejects only when options.signal is aborted.
   */
  async lookup(adapter: StoreAdapter, product: FeedProduct, options: LookupOptions = {}): Promise<LookupOutcome> {
    const reference = product.reference

    if (!isSearchable(reference)) {
      this.log.debug('MATCHER_LOOKUP_SKIPPED', {
        storeId: adapter.id,
        productId: product.id,
        rawReference: product.rawReference,
      })
      return { status: 'skipped', storeId: adapter.id, reference: '', reason: 'unsearchable reference' }
    }

    const key = `${adapter.id}\u0000${reference.canonical}`
    const pending = this.inflight.get(key)
    if (pending) {
      this.log.debug('MATCHER_LOOKUP_JOINED', { storeId: adapter.id, reference: reference.canonical })
      return pending
    }

    const task = this.cache.withKey(adapter.id, reference, () => this.resolve(adapter, product, options))
    this.inflight.set(key, task)
    try {
      return await task
    } finally {
      if (this.inflight.get(key) === task) {
        this.inflight.delete(key)
      }
    }
  }

  /**
   * Look up every product on one store, one at a time, and log the run's
   * counters.
   */
  async runStore(
    adapter: StoreAdapter,
    products: readonly FeedProduct[],
    options: LookupOptions = {}
  ): Promise<StoreRunResult> {
    const startTime = this.now()
    if (!options.noCache) {
      await this.cache.open(adapter.id)
    }

    const lookups: ProductLookup[] = []
    for (const product of products) {
      options.signal?.throwIfAborted()
      lookups.push({ product, outcome: await this.lookup(adapter, product, options) })
    }

    const metrics = summarizeOutcomes(
      adapter.id,
      lookups.map((lookup) => lookup.outcome),
      this.now() - startTime
    )
    recordStoreRunCompleted(metrics, this.log)
    return { storeId: adapter.id, lookups, metrics }
  }

  /**
   * Run every store concurrently. Stores share nothing but the cache
   * handle, whose namespaces are independent.
   */
  async runAll(
    adapters: readonly StoreAdapter[],
    products: readonly FeedProduct[],
    options: LookupOptions = {}
  ): Promise<StoreRunResult[]> {
    return Promise.all(adapters.map((adapter) => this.runStore(adapter, products, options)))
  }

  private async resolve(
    adapter: StoreAdapter,
    product: FeedProduct,
    options: LookupOptions
  ): Promise<LookupOutcome> {
    const storeId = adapter.id
    const reference = product.reference
    const base = { storeId, reference: reference.canonical }

    if (!options.refresh && !options.noCache) {
      const cached = await this.cache.lookup(storeId, reference)
      if (cached) {
        return { ...base, status: 'cached', entry: cached }
      }
    }

    // Stores match the reference as printed, separators included
    const query = product.rawReference || reference.canonical

    try {
      const signals = await adapter.search(query, this.fetcherFor(storeId), options.signal)

      if (signals) {
        const missing = missingSignalFields(signals)
        if (missing.length > 0) {
          const incomplete = new SignalError('Page signals incomplete', { storeId, url: signals.url, missing })
          this.log.debug('MATCHER_SIGNALS_INCOMPLETE', errorLogMeta(incomplete))
        }
      }

      const verdict = signals
        ? score(reference, signals, { acceptThreshold: this.acceptThreshold })
        : noMatch('no candidate page')
      const entry = options.noCache
        ? this.cache.entryFor(storeId, reference, verdict)
        : await this.cache.store(storeId, reference, verdict)

      this.log.debug('MATCHER_LOOKUP_SCORED', {
        ...base,
        matchType: verdict.matchType,
        confidence: verdict.confidence,
        isValid: verdict.isValid,
      })
      return { ...base, status: 'fetched', entry }
    } catch (error) {
      options.signal?.throwIfAborted()
      this.log.warn('MATCHER_LOOKUP_FAILED', { ...base, query, ...errorLogMeta(error) })
      return { ...base, status: 'failed', error: classifyError(error) }
    }
  }
}
