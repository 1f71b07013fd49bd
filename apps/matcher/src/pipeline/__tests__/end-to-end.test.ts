import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { loadEngineConfig } from '../../config/settings'
import { parseFeed } from '../../feed/parser'
import { TemplateStoreAdapter } from '../../stores/template-adapter'
import { buildReportRows } from '../../report/report'
import { createMatcherContext } from '../context'
import { createTestLogger } from '../../__tests__/test-logger'

const T0 = Date.UTC(2026, 0, 1)
const TEN_DAYS = 864_000_000

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:g="http://base.google.com/ns/1.0">
<channel>
<item>
<g:id>7001</g:id>
<g:title>HiFlo sintered brake pads</g:title>
<g:link>https://shop.example/p/7001</g:link>
<g:price>100,00 EUR</g:price>
<g:description>Front pads. Ref. Fabricante: P-HF.1595</g:description>
</item>
</channel>
</rss>`

const PRODUCT_PAGE = `<html><head>
<script type="application/ld+json">{"@type":"Product","name":"HiFlo pads","sku":"PHF1595","offers":{"price":"120.00","priceCurrency":"EUR"}}</script>
</head><body><h1>HiFlo sintered pads</h1></body></html>`

describe('feed to report', () => {
  const originalFetch = globalThis.fetch
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'e2e-'))
  })

  afterEach(async () => {
    globalThis.fetch = originalFetch
    await rm(dir, { recursive: true, force: true })
  })

  it('matches P-HF.1595 by sku, caches it for ten days and prices the store 20% above the feed', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response(PRODUCT_PAGE, { status: 200 }))
    globalThis.fetch = fetchSpy
    const logger = createTestLogger()

    const config = loadEngineConfig({ MATCHER_CACHE_DIR: dir })
    const context = createMatcherContext(config, {
      now: () => T0,
      sleep: async () => undefined,
      random: () => 0,
      logger,
    })
    const adapter = new TemplateStoreAdapter(
      {
        id: 'moto',
        name: 'Moto Example',
        searchUrl: 'https://moto.example/search?q={query}',
        enabled: true,
      },
      { logger }
    )

    const { products } = parseFeed(FEED, { logger })
    expect(products[0].reference).toEqual({ canonical: 'PHF1595', parts: ['PHF1595'] })

    const result = await context.runner.runStore(adapter, products)
    const outcome = result.lookups[0].outcome
    if (outcome.status !== 'fetched') throw new Error(`unexpected ${outcome.status}`)

    expect(fetchSpy).toHaveBeenCalledWith('https://moto.example/search?q=P-HF.1595', expect.anything())
    expect(outcome.entry.verdict).toMatchObject({
      matchType: 'SKU_MATCH',
      confidence: 1,
      isValid: true,
      price: 120,
      currency: 'EUR',
    })
    expect(outcome.entry.expiresAt).toBe(T0 + TEN_DAYS)

    const [row] = buildReportRows(products, [result])
    expect(row.feedPrice).toBe(100)
    expect(row.stores.moto.difference).toBe(0.2)

    // The request went through the store's limiter
    expect(context.limiterFor('moto').stats()).toMatchObject({ samples: 1, recentFailRate: 0, mode: 'NORMAL' })

    await context.cache.flush()
    const persisted = JSON.parse(await readFile(context.cache.filePathFor('moto'), 'utf-8'))
    expect(persisted.entries.PHF1595).toMatchObject({ fetchedAt: T0, expiresAt: T0 + TEN_DAYS })
  })
})
