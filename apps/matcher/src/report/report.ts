/**
 * Comparison report
 *
 * One row per feed product with a cell per store. The price difference is
 * (storePrice - feedPrice) / feedPrice: positive when the store is dearer.
 */

import { mkdir, writeFile } from 'fs/promises'
import { dirname } from 'path'
import { loggers } from '../config/logger'
import type { ILogger } from '../config/logger'
import type { FeedProduct } from '../feed/parser'
import type { LookupOutcome, LookupStatus, StoreRunResult } from '../pipeline/types'
import type { MatchType } from '../validator/types'

export interface StoreCell {
  status: LookupStatus
  isValid: boolean
  matchType: MatchType | null
  confidence: number | null
  /** Store price, only for accepted verdicts */
  price: number | null
  currency: string | null
  difference: number | null
  url: string | null
}

export interface ReportRow {
  id: string
  title: string
  rawReference: string
  reference: string
  feedPrice: number | null
  feedCurrency: string | null
  stores: Record<string, StoreCell>
}

export interface ComparisonReport {
  generatedAt: string
  stores: string[]
  rows: ReportRow[]
}

/**
 * Relative difference of the store price against the feed price, or null
 * when either price is missing or the feed price is not positive.
 */
export function priceDifference(
  storePrice: number | null | undefined,
  feedPrice: number | null | undefined
): number | null {
  if (storePrice === null || storePrice === undefined || !Number.isFinite(storePrice)) return null
  if (feedPrice === null || feedPrice === undefined || !Number.isFinite(feedPrice) || feedPrice <= 0) {
    return null
  }
  return (storePrice - feedPrice) / feedPrice
}

const EMPTY_CELL: Omit<StoreCell, 'status'> = {
  isValid: false,
  matchType: null,
  confidence: null,
  price: null,
  currency: null,
  difference: null,
  url: null,
}

export function buildStoreCell(product: FeedProduct, outcome: LookupOutcome): StoreCell {
  if (outcome.status !== 'cached' && outcome.status !== 'fetched') {
    return { ...EMPTY_CELL, status: outcome.status }
  }

  const verdict = outcome.entry.verdict
  const cell: StoreCell = {
    ...EMPTY_CELL,
    status: outcome.status,
    isValid: verdict.isValid,
    matchType: verdict.matchType,
    confidence: verdict.confidence,
    url: verdict.url ?? null,
  }
  if (!verdict.isValid || verdict.price === undefined) return cell

  const currency = verdict.currency ?? null
  // Prices in different currencies are not compared
  const comparable = !currency || !product.priceCurrency || currency === product.priceCurrency

  return {
    ...cell,
    price: verdict.price,
    currency,
    difference: comparable ? priceDifference(verdict.price, product.priceAmount) : null,
  }
}

export function buildReportRows(
  products: readonly FeedProduct[],
  results: readonly StoreRunResult[]
): ReportRow[] {
  const outcomesByStore = results.map((result) => ({
    storeId: result.storeId,
    byProduct: new Map(result.lookups.map((lookup) => [lookup.product, lookup.outcome])),
  }))

  return products.map((product) => {
    const stores: Record<string, StoreCell> = {}
    for (const { storeId, byProduct } of outcomesByStore) {
      const outcome = byProduct.get(product)
      if (outcome) {
        stores[storeId] = buildStoreCell(product, outcome)
      }
    }

    return {
      id: product.id,
      title: product.title,
      rawReference: product.rawReference,
      reference: product.reference.canonical,
      feedPrice: product.priceAmount,
      feedCurrency: product.priceCurrency,
      stores,
    }
  })
}

export function createReport(
  rows: ReportRow[],
  storeIds: readonly string[],
  generatedAt: Date = new Date()
): ComparisonReport {
  return { generatedAt: generatedAt.toISOString(), stores: [...storeIds], rows }
}

export async function writeReport(
  path: string,
  report: ComparisonReport,
  logger: ILogger = loggers.report
): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, 'utf-8')
  logger.info('REPORT_WRITTEN', { path, rows: report.rows.length, stores: report.stores.length })
}
