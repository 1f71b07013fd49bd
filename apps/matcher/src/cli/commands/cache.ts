import type { ResultCache } from '../../cache/result-cache'
import type { CacheStats } from '../../cache/types'
import { createMatcherContext } from '../../pipeline/context'
import type { CommandEnvironment } from './shared'
import { loadConfig, reportFailure } from './shared'

interface CacheCommandArgs extends CommandEnvironment {
  /** All stores with a cache file when empty */
  store: string
}

function openCache(args: CacheCommandArgs): ResultCache | null {
  const config = loadConfig(args)
  if (!config) return null
  return createMatcherContext(config, { cwd: args.cwd, logger: args.logger }).cache
}

async function targetStores(cache: ResultCache, store: string): Promise<string[]> {
  return store ? [store] : cache.knownStores()
}

export async function runCacheStatsCommand(args: CacheCommandArgs): Promise<number> {
  const cache = openCache(args)
  if (!cache) return 2

  try {
    const stats: CacheStats[] = []
    for (const storeId of await targetStores(cache, args.store)) {
      await cache.open(storeId)
      stats.push(await cache.stats(storeId))
    }
    console.log(JSON.stringify(stats, null, 2))
    return 0
  } catch (error) {
    return reportFailure('cache:stats', error, args.logger)
  }
}

export async function runCachePurgeCommand(args: CacheCommandArgs): Promise<number> {
  const cache = openCache(args)
  if (!cache) return 2

  try {
    const purged: Array<{ storeId: string; purged: number; remaining: number }> = []
    for (const storeId of await targetStores(cache, args.store)) {
      // Opening already drops what expired while nothing was running
      const report = await cache.open(storeId)
      const removed = report.purged + (await cache.purgeExpired(storeId))
      const { total } = await cache.stats(storeId)
      purged.push({ storeId, purged: removed, remaining: total })
    }
    await cache.flush()
    console.log(JSON.stringify(purged, null, 2))
    return 0
  } catch (error) {
    return reportFailure('cache:purge', error, args.logger)
  }
}
