export { parseFeed, readFeedFile } from './parser'
export type { FeedProduct, FeedSummary, ParsedFeed, ParseFeedOptions } from './parser'
export { parsePrice, detectCurrency, MAX_PRICE } from './price'
