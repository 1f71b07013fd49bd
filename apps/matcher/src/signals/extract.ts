/**
 * Page signal extraction
 *
 * Turns a fetched product page into the signals the validator scores:
 *   - title: first <h1>, else og:title, else the JSON-LD name, else <title>
 *   - sku: JSON-LD Product.sku, else [itemprop=sku]
 *   - metaCodes: every declared product code (JSON-LD sku/mpn/gtin*,
 *     productID and the matching microdata)
 *   - bodyText: visible text, whitespace collapsed
 *   - price: JSON-LD offers, else [itemprop=price], else a euro amount in the text
 */

import type { CheerioAPI } from 'cheerio'
import { z } from 'zod'
import { detectCurrency, parsePrice } from '../feed/price'
import type { PageSignals } from '../validator/types'
import { collapseWhitespace, firstAttr, firstText, itemValues, loadHtml, safeJsonParse } from './html'

const SELECTORS = {
  jsonLd: 'script[type="application/ld+json"]',
  title: 'h1',
  ogTitle: 'meta[property="og:title"]',
  documentTitle: 'title',
  sku: '[itemprop="sku"]',
  codes: '[itemprop="sku"], [itemprop="mpn"], [itemprop="productID"], [itemprop="gtin13"]',
  price: '[itemprop="price"]',
  priceCurrency: '[itemprop="priceCurrency"]',
  hidden: 'script, style, noscript, template',
} as const

const EURO_AMOUNT = /€\s*\d[\d.,]*|\d[\d.,]*\s*€/

const scalar = z.union([z.string(), z.number()]).transform((value) => String(value).trim())
const amount = z.union([z.string(), z.number()])

const jsonLdOfferSchema = z.object({
  price: amount.optional(),
  lowPrice: amount.optional(),
  priceCurrency: z.string().optional(),
})

const jsonLdProductSchema = z.object({
  '@type': z.union([z.string(), z.array(z.string())]),
  name: z.string().optional(),
  sku: scalar.optional(),
  mpn: scalar.optional(),
  gtin: scalar.optional(),
  gtin8: scalar.optional(),
  gtin12: scalar.optional(),
  gtin13: scalar.optional(),
  gtin14: scalar.optional(),
  productID: scalar.optional(),
  offers: z.union([jsonLdOfferSchema, z.array(jsonLdOfferSchema)]).optional(),
})

type JsonLdProduct = z.infer<typeof jsonLdProductSchema>
type JsonLdOffer = z.infer<typeof jsonLdOfferSchema>

function isTypeMatch(value: string | string[], expected: string): boolean {
  const types = Array.isArray(value) ? value : [value]
  return types.some((type) => type.toLowerCase() === expected.toLowerCase())
}

function flattenJsonLdNodes(value: unknown): unknown[] {
  const queue: unknown[] = Array.isArray(value) ? [...value] : [value]
  const nodes: unknown[] = []

  while (queue.length > 0) {
    const current = queue.shift()
    if (!current || typeof current !== 'object') continue
    nodes.push(current)

    if ('@graph' in current && Array.isArray(current['@graph'])) {
      queue.push(...current['@graph'])
    }
  }

  return nodes
}

function extractJsonLdProduct($: CheerioAPI): JsonLdProduct | null {
  const scripts = $(SELECTORS.jsonLd)

  for (let i = 0; i < scripts.length; i++) {
    const raw = scripts.eq(i).text().trim()
    if (!raw) continue

    const parsed = safeJsonParse(raw)
    if (!parsed.ok) continue

    for (const node of flattenJsonLdNodes(parsed.value)) {
      const product = jsonLdProductSchema.safeParse(node)
      if (product.success && isTypeMatch(product.data['@type'], 'Product')) {
        return product.data
      }
    }
  }

  return null
}

function toAmount(value: string | number | undefined): number | null {
  if (value === undefined) return null
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null
  }
  return parsePrice(value)
}

function offerList(product: JsonLdProduct | null): JsonLdOffer[] {
  if (!product?.offers) return []
  return Array.isArray(product.offers) ? product.offers : [product.offers]
}

function jsonLdCodes(product: JsonLdProduct | null): string[] {
  if (!product) return []
  return [
    product.sku,
    product.mpn,
    product.gtin,
    product.gtin8,
    product.gtin12,
    product.gtin13,
    product.gtin14,
    product.productID,
  ].filter((code): code is string => Boolean(code))
}

interface PriceSignal {
  price?: number
  currency?: string
}

function extractPrice(
  $: CheerioAPI,
  product: JsonLdProduct | null,
  bodyText: string
): PriceSignal {
  for (const offer of offerList(product)) {
    const price = toAmount(offer.price) ?? toAmount(offer.lowPrice)
    if (price !== null) {
      const currency = offer.priceCurrency ?? firstAttr($, SELECTORS.priceCurrency, 'content')
      return { price, currency }
    }
  }

  const microdata = itemValues($, SELECTORS.price)[0]
  const microdataPrice = parsePrice(microdata)
  if (microdataPrice !== null) {
    const currency =
      firstAttr($, SELECTORS.priceCurrency, 'content') ?? detectCurrency(microdata) ?? undefined
    return { price: microdataPrice, currency }
  }

  const match = bodyText.match(EURO_AMOUNT)
  const textPrice = parsePrice(match?.[0])
  if (textPrice !== null) {
    return { price: textPrice, currency: 'EUR' }
  }

  return {}
}

/**
 * Extract page signals from product page HTML.
 * Never throws: anything missing comes back empty.
 */
export function extractPageSignals(html: string, url: string): PageSignals {
  const $ = loadHtml(html)
  const product = extractJsonLdProduct($)

  const title =
    firstText($, SELECTORS.title) ||
    firstAttr($, SELECTORS.ogTitle, 'content') ||
    product?.name?.trim() ||
    firstText($, SELECTORS.documentTitle)

  const sku = product?.sku || itemValues($, SELECTORS.sku)[0]
  const metaCodes = [...new Set([...jsonLdCodes(product), ...itemValues($, SELECTORS.codes)])]

  $(SELECTORS.hidden).remove()
  const bodyText = collapseWhitespace($('body').text())
  const { price, currency } = extractPrice($, product, bodyText)

  return {
    ...(sku ? { sku } : {}),
    title,
    url,
    metaCodes,
    bodyText,
    ...(price !== undefined ? { price } : {}),
    ...(currency ? { currency } : {}),
  }
}
