/**
 * Product feed parser
 *
 * Reads a Google Shopping style RSS feed:
 *
 *   <rss xmlns:g="http://base.google.com/ns/1.0"><channel>
 *     <item>
 *       <g:id>12345</g:id>
 *       <g:title>Brake pads</g:title>
 *       <g:link>https://shop.example/p/12345</g:link>
 *       <g:price>331.50 EUR</g:price>
 *       <g:description>... Ref. Fabricante: H.085.LR1X ...</g:description>
 *     </item>
 *   </channel></rss>
 *
 * The manufacturer reference always comes from the description label, never
 * from g:mpn. Items without a usable reference are counted and skipped.
 */

import { readFile } from 'fs/promises'
import { XMLParser, XMLValidator } from 'fast-xml-parser'
import {
  extractReferenceFromDescription,
  isComposite,
  isSearchable,
  normalize,
} from '@refwatch/reference'
import type { NormalizedReference } from '@refwatch/reference'
import { loggers } from '../config/logger'
import type { ILogger } from '../config/logger'
import { FeedError } from '../errors'
import { detectCurrency, parsePrice } from './price'

export interface FeedProduct {
  id: string
  title: string
  link: string
  rawReference: string
  reference: NormalizedReference
  priceText: string
  /** null when the price text could not be parsed */
  priceAmount: number | null
  priceCurrency: string | null
}

export interface FeedSummary {
  totalItems: number
  missingReference: number
  invalidReference: number
  products: number
  simple: number
  composite: number
}

export interface ParsedFeed {
  products: FeedProduct[]
  summary: FeedSummary
}

export interface ParseFeedOptions {
  /** Stop after this many products (0 or undefined = no limit) */
  limit?: number
  logger?: ILogger
}

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (tagName) => tagName === 'item',
})

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Text content of a parsed node. Repeated tags (e.g. both <title> and
 * <g:title>, which collapse to one name) yield the first non-empty text.
 */
function textOf(node: unknown): string {
  if (typeof node === 'string') return node.trim()
  if (typeof node === 'number' || typeof node === 'boolean') return String(node)
  if (Array.isArray(node)) {
    for (const child of node) {
      const text = textOf(child)
      if (text) return text
    }
    return ''
  }
  if (isRecord(node)) return textOf(node['#text'])
  return ''
}

/** All <item> elements, wherever they sit in the document */
function findItems(node: unknown): Record<string, unknown>[] {
  if (Array.isArray(node)) {
    return node.flatMap(findItems)
  }
  if (!isRecord(node)) return []

  const items: Record<string, unknown>[] = []
  for (const [key, value] of Object.entries(node)) {
    if (key === 'item' && Array.isArray(value)) {
      items.push(...value.filter(isRecord))
    } else {
      items.push(...findItems(value))
    }
  }
  return items
}

/**
 * Parse feed XML into products with normalized references.
 *
 * @throws FeedError when the document is not well-formed XML
 */
export function parseFeed(xml: string, options: ParseFeedOptions = {}): ParsedFeed {
  const log = options.logger ?? loggers.feed
  const limit = options.limit && options.limit > 0 ? options.limit : Infinity

  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    throw new FeedError(`Feed is not well-formed XML: ${validation.err.msg}`, {
      line: validation.err.line,
      code: validation.err.code,
    })
  }

  const items = findItems(parser.parse(xml))
  const products: FeedProduct[] = []
  let missingReference = 0
  let invalidReference = 0
  let totalItems = 0

  for (const item of items) {
    if (products.length >= limit) break
    totalItems++

    const rawReference = extractReferenceFromDescription(textOf(item.description))
    if (!rawReference) {
      missingReference++
      continue
    }

    const reference = normalize(rawReference)
    if (!isSearchable(reference)) {
      invalidReference++
      log.debug('FEED_ITEM_INVALID_REFERENCE', { id: textOf(item.id), rawReference })
      continue
    }

    const priceText = textOf(item.price)
    products.push({
      id: textOf(item.id),
      title: textOf(item.title),
      link: textOf(item.link),
      rawReference,
      reference,
      priceText,
      priceAmount: parsePrice(priceText),
      priceCurrency: detectCurrency(priceText),
    })
  }

  const composite = products.filter((product) => isComposite(product.reference)).length
  const summary: FeedSummary = {
    totalItems,
    missingReference,
    invalidReference,
    products: products.length,
    simple: products.length - composite,
    composite,
  }
  log.info('FEED_PARSED', { ...summary })

  return { products, summary }
}

/**
 * Read and parse a feed file.
 *
 * @throws FeedError when the file cannot be read or parsed
 */
export async function readFeedFile(path: string, options: ParseFeedOptions = {}): Promise<ParsedFeed> {
  let xml: string
  try {
    xml = await readFile(path, 'utf-8')
  } catch (error) {
    throw new FeedError(`Feed not readable: ${path}`, { path }, { cause: error })
  }
  return parseFeed(xml, options)
}
