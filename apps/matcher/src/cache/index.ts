export { ResultCache } from './result-cache'
export type { ResultCacheOptions } from './result-cache'
export { KeyedMutex } from './keyed-mutex'
export { CACHE_FILE_VERSION } from './schema'
export type { CacheEntry, CacheStats, LoadReport } from './types'
