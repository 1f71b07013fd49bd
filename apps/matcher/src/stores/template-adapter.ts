/**
 * Template Store Adapter
 *
 * Data-driven store integration: fills the search URL template with the
 * query, then either scores the search result page itself (stores that
 * redirect straight to the product) or follows the first link matching
 * productLinkSelector. One candidate page per query, never more.
 */

import { loggers } from '../config/logger'
import type { ILogger } from '../config/logger'
import { StoreFetchError } from '../errors'
import type { Fetcher } from '../fetch/types'
import { extractPageSignals } from '../signals/extract'
import { firstAttr, loadHtml } from '../signals/html'
import type { PageSignalsInput } from '../validator/types'
import { QUERY_PLACEHOLDER } from './definitions'
import type { StoreAdapter, StoreDefinition } from './types'

export interface TemplateStoreAdapterOptions {
  logger?: ILogger
}

interface FetchedPage {
  html: string
  url: string
}

export class TemplateStoreAdapter implements StoreAdapter {
  readonly id: string
  readonly name: string
  private readonly log: ILogger

  constructor(
    private readonly definition: StoreDefinition,
    options: TemplateStoreAdapterOptions = {}
  ) {
    this.id = definition.id
    this.name = definition.name
    this.log = options.logger ?? loggers.stores
  }

  searchUrlFor(query: string): string {
    return this.definition.searchUrl.split(QUERY_PLACEHOLDER).join(encodeURIComponent(query.trim()))
  }

  async search(query: string, fetcher: Fetcher, signal?: AbortSignal): Promise<PageSignalsInput | null> {
    const searchPage = await this.fetchPage(fetcher, this.searchUrlFor(query), signal)
    if (!searchPage) return null

    const selector = this.definition.productLinkSelector
    if (!selector) {
      return extractPageSignals(searchPage.html, searchPage.url)
    }

    const href = firstAttr(loadHtml(searchPage.html), selector, 'href')
    if (!href) {
      this.log.debug('STORE_NO_RESULTS', { storeId: this.id, query })
      return null
    }

    const productUrl = this.resolveLink(href, searchPage.url)
    if (!productUrl) {
      this.log.warn('STORE_PRODUCT_LINK_INVALID', { storeId: this.id, query, href })
      return null
    }

    const productPage = await this.fetchPage(fetcher, productUrl, signal)
    if (!productPage) return null
    return extractPageSignals(productPage.html, productPage.url)
  }

  private resolveLink(href: string, base: string): string | null {
    try {
      const url = new URL(href, base)
      return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : null
    } catch {
      return null
    }
  }

  /**
   * A 404 means the store has nothing under that URL. Any other failure
   * leaves the answer unknown and is thrown.
   */
  private async fetchPage(fetcher: Fetcher, url: string, signal?: AbortSignal): Promise<FetchedPage | null> {
    const result = await fetcher.fetch(url, { signal })

    if (result.status === 'ok') {
      return { html: result.html ?? '', url: result.finalUrl ?? url }
    }
    if (result.status === 'error' && result.statusCode === 404) {
      this.log.debug('STORE_PAGE_NOT_FOUND', { storeId: this.id, url })
      return null
    }

    throw new StoreFetchError(`Fetch ${result.status} for ${url}`, {
      storeId: this.id,
      url,
      status: result.status,
      statusCode: result.statusCode,
      reason: result.error,
    })
  }
}
