import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { normalize } from '@refwatch/reference'
import type { CacheEntry } from '../../cache/types'
import type { FeedProduct } from '../../feed/parser'
import type { StoreRunResult } from '../../pipeline/types'
import { summarizeOutcomes } from '../../pipeline/metrics'
import { createVerdict, noMatch } from '../../validator/verdict'
import type { MatchVerdict } from '../../validator/types'
import { buildReportRows, buildStoreCell, createReport, priceDifference, writeReport } from '../report'
import { createTestLogger } from '../../__tests__/test-logger'

const T0 = Date.UTC(2026, 0, 1)

const pads: FeedProduct = {
  id: '7001',
  title: 'Brake pads',
  link: 'https://shop.example/p/7001',
  rawReference: 'P-HF.1595',
  reference: normalize('P-HF.1595'),
  priceText: '100,00 EUR',
  priceAmount: 100,
  priceCurrency: 'EUR',
}

const chain: FeedProduct = {
  id: '7002',
  title: 'Chain kit',
  link: 'https://shop.example/p/7002',
  rawReference: '71821AKN',
  reference: normalize('71821AKN'),
  priceText: '',
  priceAmount: null,
  priceCurrency: null,
}

function entry(verdict: MatchVerdict): CacheEntry {
  return { key: 'X', storeId: 'moto', verdict, fetchedAt: T0, expiresAt: T0 + 1 }
}

const skuMatch = createVerdict({
  matchType: 'SKU_MATCH',
  confidence: 1,
  reason: 'sku equals reference',
  price: 120,
  currency: 'EUR',
  url: 'https://moto.example/p/1',
})

describe('priceDifference', () => {
  it('is relative to the feed price', () => {
    expect(priceDifference(120, 100)).toBe(0.2)
    expect(priceDifference(75, 100)).toBe(-0.25)
    expect(priceDifference(100, 100)).toBe(0)
  })

  it('is null without both prices or with a non-positive feed price', () => {
    expect(priceDifference(null, 100)).toBeNull()
    expect(priceDifference(120, undefined)).toBeNull()
    expect(priceDifference(120, 0)).toBeNull()
    expect(priceDifference(Number.NaN, 100)).toBeNull()
  })
})

describe('buildStoreCell', () => {
  it('fills price and difference for accepted verdicts', () => {
    const cell = buildStoreCell(pads, { status: 'fetched', storeId: 'moto', reference: 'PHF1595', entry: entry(skuMatch) })

    expect(cell).toEqual({
      status: 'fetched',
      isValid: true,
      matchType: 'SKU_MATCH',
      confidence: 1,
      price: 120,
      currency: 'EUR',
      difference: 0.2,
      url: 'https://moto.example/p/1',
    })
  })

  it('leaves the price out of rejected verdicts', () => {
    const rejected = noMatch('reference not found on page', { price: 90, url: 'https://moto.example/p/2' })
    const cell = buildStoreCell(pads, { status: 'cached', storeId: 'moto', reference: 'PHF1595', entry: entry(rejected) })

    expect(cell).toMatchObject({ isValid: false, matchType: 'NO_MATCH', price: null, difference: null })
    expect(cell.url).toBe('https://moto.example/p/2')
  })

  it('does not compare prices in different currencies', () => {
    const dollars = createVerdict({ matchType: 'EXACT_MATCH', confidence: 0.95, reason: 'title', price: 130, currency: 'USD' })
    const cell = buildStoreCell(pads, { status: 'fetched', storeId: 'moto', reference: 'PHF1595', entry: entry(dollars) })

    expect(cell).toMatchObject({ price: 130, currency: 'USD', difference: null })
  })

  it('is empty for failed and skipped lookups', () => {
    const cell = buildStoreCell(pads, {
      status: 'failed',
      storeId: 'moto',
      reference: 'PHF1595',
      error: {
        category: 'network',
        code: 'STORE_FETCH_FAILED',
        message: 'blocked',
        isOperational: true,
        isRetryable: true,
      },
    })

    expect(cell).toEqual({
      status: 'failed',
      isValid: false,
      matchType: null,
      confidence: null,
      price: null,
      currency: null,
      difference: null,
      url: null,
    })
  })
})

describe('buildReportRows', () => {
  it('has one row per product with a cell per store that saw it', () => {
    const outcomes = [
      { product: pads, outcome: { status: 'fetched' as const, storeId: 'moto', reference: 'PHF1595', entry: entry(skuMatch) } },
      { product: chain, outcome: { status: 'skipped' as const, storeId: 'moto', reference: '', reason: 'unsearchable reference' } },
    ]
    const result: StoreRunResult = {
      storeId: 'moto',
      lookups: outcomes,
      metrics: summarizeOutcomes('moto', outcomes.map((lookup) => lookup.outcome), 0),
    }

    const rows = buildReportRows([pads, chain], [result])

    expect(rows.map((row) => [row.id, row.reference, row.feedPrice, row.stores.moto.status])).toEqual([
      ['7001', 'PHF1595', 100, 'fetched'],
      ['7002', '71821AKN', null, 'skipped'],
    ])
    expect(rows[0].stores.moto.difference).toBe(0.2)
  })
})

describe('writeReport', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'report-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('writes pretty JSON into a new directory', async () => {
    const logger = createTestLogger()
    const path = join(dir, 'out', 'report.json')
    const report = createReport([], ['moto'], new Date(T0))

    await writeReport(path, report, logger)

    const content = await readFile(path, 'utf-8')
    expect(content).toBe('{\n  "generatedAt": "2026-01-01T00:00:00.000Z",\n  "stores": [\n    "moto"\n  ],\n  "rows": []\n}\n')
    expect(logger.info).toHaveBeenCalledWith('REPORT_WRITTEN', { path, rows: 0, stores: 1 })
  })
})
