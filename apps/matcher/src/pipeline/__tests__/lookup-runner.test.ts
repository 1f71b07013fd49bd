import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { normalize } from '@refwatch/reference'
import { ResultCache } from '../../cache/result-cache'
import { StoreFetchError } from '../../errors'
import type { FeedProduct } from '../../feed/parser'
import type { Fetcher } from '../../fetch/types'
import type { StoreAdapter } from '../../stores/types'
import type { PageSignalsInput } from '../../validator/types'
import { LookupRunner } from '../lookup-runner'
import { createTestLogger, events } from '../../__tests__/test-logger'
import type { TestLogger } from '../../__tests__/test-logger'

const DAY = 24 * 60 * 60 * 1000
const T0 = Date.UTC(2026, 0, 1)

const skuPage: PageSignalsInput = {
  sku: 'P-HF1595',
  title: 'HiFlo sintered pads',
  url: 'https://moto.example/p/hiflo-pads',
  bodyText: 'Sintered pads',
  price: 120,
  currency: 'EUR',
}

function product(id: string, rawReference: string, priceAmount: number | null = 100): FeedProduct {
  return {
    id,
    title: `Product ${id}`,
    link: `https://shop.example/p/${id}`,
    rawReference,
    reference: normalize(rawReference),
    priceText: priceAmount === null ? '' : `${priceAmount} EUR`,
    priceAmount,
    priceCurrency: priceAmount === null ? null : 'EUR',
  }
}

function createAdapter(
  id: string,
  search: (query: string, fetcher: Fetcher, signal?: AbortSignal) => Promise<PageSignalsInput | null>
) {
  return { id, name: `Store ${id}`, search: vi.fn(search) } satisfies StoreAdapter
}

describe('LookupRunner', () => {
  let dir: string
  let clock: number
  let logger: TestLogger
  let cache: ResultCache
  const fetcher: Fetcher = { fetch: vi.fn() }
  const fetcherFor = vi.fn((_storeId: string) => fetcher)

  function createRunner(): LookupRunner {
    return new LookupRunner({ cache, fetcherFor, now: () => clock, logger })
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'runner-'))
    clock = T0
    logger = createTestLogger()
    fetcherFor.mockClear()
    cache = new ResultCache({
      directory: dir,
      ttlFoundMs: 10 * DAY,
      ttlNotFoundMs: 4 * DAY,
      now: () => clock,
      logger,
    })
  })

  afterEach(async () => {
    await cache.flush()
    await rm(dir, { recursive: true, force: true })
  })

  describe('lookup', () => {
    it('skips unsearchable references without touching the store', async () => {
      const adapter = createAdapter('moto', async () => skuPage)

      const outcome = await createRunner().lookup(adapter, product('1', '-- / --'))

      expect(outcome).toEqual({
        status: 'skipped',
        storeId: 'moto',
        reference: '',
        reason: 'unsearchable reference',
      })
      expect(adapter.search).not.toHaveBeenCalled()
    })

    it('searches with the raw reference, scores and caches the verdict', async () => {
      const adapter = createAdapter('moto', async () => skuPage)

      const outcome = await createRunner().lookup(adapter, product('1', 'P-HF.1595'))

      expect(adapter.search).toHaveBeenCalledWith('P-HF.1595', fetcher, undefined)
      expect(fetcherFor).toHaveBeenCalledWith('moto')
      expect(outcome.status).toBe('fetched')
      if (outcome.status !== 'fetched') return
      expect(outcome.reference).toBe('PHF1595')
      expect(outcome.entry).toMatchObject({ key: 'PHF1595', storeId: 'moto', fetchedAt: T0, expiresAt: T0 + 10 * DAY })
      expect(outcome.entry.verdict).toMatchObject({ matchType: 'SKU_MATCH', confidence: 1, isValid: true, price: 120 })
      await expect(cache.lookup('moto', normalize('PHF1595'))).resolves.toBe(outcome.entry)
    })

    it('serves the cached verdict on the next lookup', async () => {
      const adapter = createAdapter('moto', async () => skuPage)
      const runner = createRunner()

      await runner.lookup(adapter, product('1', 'P-HF.1595'))
      clock += DAY
      const outcome = await runner.lookup(adapter, product('2', 'phf-1595'))

      expect(outcome.status).toBe('cached')
      expect(adapter.search).toHaveBeenCalledTimes(1)
    })

    it('fetches again when refreshing', async () => {
      const adapter = createAdapter('moto', async () => skuPage)
      const runner = createRunner()

      await runner.lookup(adapter, product('1', 'P-HF.1595'))
      const outcome = await runner.lookup(adapter, product('1', 'P-HF.1595'), { refresh: true })

      expect(outcome.status).toBe('fetched')
      expect(adapter.search).toHaveBeenCalledTimes(2)
    })

    it('neither reads nor writes the cache with noCache', async () => {
      const adapter = createAdapter('moto', async () => skuPage)
      const runner = createRunner()

      await runner.lookup(adapter, product('1', 'P-HF.1595'))
      clock += DAY
      const outcome = await runner.lookup(adapter, product('1', 'P-HF.1595'), { noCache: true })

      expect(adapter.search).toHaveBeenCalledTimes(2)
      if (outcome.status !== 'fetched') throw new Error(`unexpected ${outcome.status}`)
      expect(outcome.entry).toMatchObject({ key: 'PHF1595', fetchedAt: T0 + DAY, expiresAt: T0 + 11 * DAY })
      expect((await cache.lookup('moto', normalize('PHF1595')))?.fetchedAt).toBe(T0)
    })

    it('caches a not-found verdict when the store has no candidate', async () => {
      const adapter = createAdapter('moto', async () => null)

      const outcome = await createRunner().lookup(adapter, product('1', 'H.085.LR1X'))

      if (outcome.status !== 'fetched') throw new Error(`unexpected ${outcome.status}`)
      expect(outcome.entry.verdict).toMatchObject({
        matchType: 'NO_MATCH',
        isValid: false,
        reason: 'no candidate page',
      })
      expect(outcome.entry.expiresAt).toBe(T0 + 4 * DAY)
    })

    it('reports a failed store without caching anything', async () => {
      const adapter = createAdapter('moto', async () => {
        throw new StoreFetchError('Fetch blocked', { storeId: 'moto' })
      })

      const outcome = await createRunner().lookup(adapter, product('1', 'P-HF.1595'))

      if (outcome.status !== 'failed') throw new Error(`unexpected ${outcome.status}`)
      expect(outcome.error).toMatchObject({ category: 'network', code: 'STORE_FETCH_FAILED', isRetryable: true })
      expect(events(logger.warn)).toEqual(['MATCHER_LOOKUP_FAILED'])
      await expect(cache.lookup('moto', normalize('P-HF.1595'))).resolves.toBeUndefined()
    })

    it('logs incomplete signals and still scores them', async () => {
      const adapter = createAdapter('moto', async () => ({ sku: 'PHF1595' }))

      const outcome = await createRunner().lookup(adapter, product('1', 'P-HF.1595'))

      if (outcome.status !== 'fetched') throw new Error(`unexpected ${outcome.status}`)
      expect(outcome.entry.verdict.matchType).toBe('SKU_MATCH')
      expect(logger.debug).toHaveBeenCalledWith(
        'MATCHER_SIGNALS_INCOMPLETE',
        expect.objectContaining({
          errorCode: 'INCOMPLETE_SIGNALS',
          errorDetails: { storeId: 'moto', url: undefined, missing: ['title', 'url', 'bodyText'] },
        })
      )
    })

    it('shares one fetch between concurrent lookups of the same reference', async () => {
      let release: () => void = () => undefined
      const gate = new Promise<void>((resolve) => {
        release = resolve
      })
      const adapter = createAdapter('moto', async () => {
        await gate
        return skuPage
      })
      const runner = createRunner()

      const first = runner.lookup(adapter, product('1', 'P-HF.1595'))
      const second = runner.lookup(adapter, product('2', 'PHF 1595'))
      release()

      const [a, b] = await Promise.all([first, second])
      expect(a).toBe(b)
      expect(adapter.search).toHaveBeenCalledTimes(1)
    })

    it('rejects when the caller aborts', async () => {
      const controller = new AbortController()
      const adapter = createAdapter('moto', async (_query, _fetcher, signal) => {
        controller.abort()
        signal?.throwIfAborted()
        return null
      })

      await expect(
        createRunner().lookup(adapter, product('1', 'P-HF.1595'), { signal: controller.signal })
      ).rejects.toThrow('This operation was aborted')
      await expect(cache.lookup('moto', normalize('P-HF.1595'))).resolves.toBeUndefined()
    })
  })

  describe('runStore', () => {
    it('processes every product and logs the counters', async () => {
      const adapter = createAdapter('moto', async (query) => (query === 'P-HF.1595' ? skuPage : null))

      const result = await createRunner().runStore(adapter, [
        product('1', 'P-HF.1595'),
        product('2', '***'),
        product('3', 'H.085.LR1X'),
      ])

      expect(result.lookups.map((lookup) => lookup.outcome.status)).toEqual(['fetched', 'skipped', 'fetched'])
      expect(result.metrics).toEqual({
        storeId: 'moto',
        products: 3,
        skipped: 1,
        cached: 0,
        fetched: 2,
        failed: 0,
        found: 1,
        notFound: 1,
        failureRate: 0,
        durationMs: 0,
      })
      expect(logger.info).toHaveBeenCalledWith(
        'MATCHER_STORE_RUN_COMPLETED',
        expect.objectContaining({ storeId: 'moto', products: 3, found: 1 })
      )
    })

    it('leaves no cache file behind with noCache', async () => {
      const adapter = createAdapter('moto', async () => skuPage)

      const result = await createRunner().runStore(adapter, [product('1', 'P-HF.1595')], { noCache: true })

      expect(result.metrics).toMatchObject({ fetched: 1, cached: 0, found: 1 })
      expect(await cache.knownStores()).toEqual([])
    })

    it('stops when the signal is aborted', async () => {
      const controller = new AbortController()
      controller.abort()
      const adapter = createAdapter('moto', async () => skuPage)

      await expect(
        createRunner().runStore(adapter, [product('1', 'P-HF.1595')], { signal: controller.signal })
      ).rejects.toThrow('This operation was aborted')
      expect(adapter.search).not.toHaveBeenCalled()
    })
  })

  describe('runAll', () => {
    it('keeps one store failing away from another store', async () => {
      const broken = createAdapter('broken', async () => {
        throw new StoreFetchError('Fetch timeout')
      })
      const healthy = createAdapter('healthy', async () => skuPage)
      const products = [product('1', 'P-HF.1595')]

      const results = await createRunner().runAll([broken, healthy], products)

      expect(results.map((result) => [result.storeId, result.metrics.failed, result.metrics.found])).toEqual([
        ['broken', 1, 0],
        ['healthy', 0, 1],
      ])
      expect((await cache.stats('broken')).total).toBe(0)
      expect((await cache.stats('healthy')).total).toBe(1)
    })
  })
})
