/**
 * Store Types
 *
 * A store adapter turns a reference query into the signals of one candidate
 * page. It knows nothing about caching or pacing: the lookup runner owns the
 * cache and the fetcher it receives is already gated by the store's limiter.
 */

import type { Fetcher } from '../fetch/types'
import type { PageSignalsInput } from '../validator/types'

export interface StoreDefinition {
  /** Stable identifier; names the store's cache namespace */
  id: string
  name: string
  /** Search page URL with a {query} placeholder */
  searchUrl: string
  /** Link to follow from the search page to the product page */
  productLinkSelector?: string
  enabled: boolean
}

export interface StoreAdapter {
  readonly id: string
  readonly name: string

  /**
   * Search the store for a reference and return the candidate page's signals.
   * Resolves null when the store has no candidate for the query.
   *
   * @throws StoreFetchError when a page could not be fetched
   */
  search(query: string, fetcher: Fetcher, signal?: AbortSignal): Promise<PageSignalsInput | null>
}
