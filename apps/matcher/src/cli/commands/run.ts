import { resolve } from 'path'
import { readFeedFile } from '../../feed/parser'
import { createMatcherContext } from '../../pipeline/context'
import { buildReportRows, createReport, writeReport } from '../../report/report'
import { loadStoreDefinitions } from '../../stores/definitions'
import { createStoreRegistry } from '../../stores/registry'
import type { CommandEnvironment } from './shared'
import { loadConfig, reportFailure } from './shared'

export const DEFAULT_REPORT_PATH = 'report.json'

interface RunCommandArgs extends CommandEnvironment {
  feed: string
  stores: string
  /** Only this store id */
  only?: string
  limit?: number
  refresh: boolean
  /** Neither read nor write the result cache */
  noCache?: boolean
  out: string
  signal?: AbortSignal
}

export async function runRunCommand(args: RunCommandArgs): Promise<number> {
  if (!args.feed) {
    console.error('Missing --feed <path>')
    return 2
  }
  if (!args.stores) {
    console.error('Missing --stores <path>')
    return 2
  }

  const config = loadConfig(args)
  if (!config) return 2

  const cwd = args.cwd ?? process.cwd()
  const logger = args.logger

  try {
    const { products, summary } = await readFeedFile(resolve(cwd, args.feed), { limit: args.limit, logger })
    const registry = createStoreRegistry(await loadStoreDefinitions(resolve(cwd, args.stores)), { logger })

    const onlyAdapter = args.only ? registry.get(args.only) : undefined
    if (args.only && !onlyAdapter) {
      console.error(`Unknown or disabled store: ${args.only}`)
      return 2
    }
    const adapters = onlyAdapter ? [onlyAdapter] : registry.list()
    if (adapters.length === 0) {
      console.error('No enabled stores')
      return 2
    }

    const context = createMatcherContext(config, { cwd, logger })
    const results = await context.runner.runAll(adapters, products, {
      refresh: args.refresh,
      noCache: args.noCache,
      signal: args.signal,
    })
    await context.cache.flush()

    const outPath = resolve(cwd, args.out || DEFAULT_REPORT_PATH)
    const report = createReport(
      buildReportRows(products, results),
      adapters.map((adapter) => adapter.id)
    )
    await writeReport(outPath, report, logger)

    console.log(
      `Products: ${summary.products} (${summary.missingReference} without reference, ${summary.invalidReference} unusable)`
    )
    for (const { metrics } of results) {
      console.log(
        `${metrics.storeId}: ${metrics.found} found, ${metrics.notFound} not found, ` +
          `${metrics.cached} from cache, ${metrics.failed} failed`
      )
    }
    console.log(`Report: ${outPath}`)
    return 0
  } catch (error) {
    return reportFailure('run', error, logger)
  }
}
