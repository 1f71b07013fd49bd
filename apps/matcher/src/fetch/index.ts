export { HttpFetcher, isHealthyResult } from './http-fetcher'
export type { HttpFetcherOptions } from './http-fetcher'
export * from './types'
