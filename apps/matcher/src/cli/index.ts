import '../env'
import { setLogLevel } from '@refwatch/logger'
import { runCachePurgeCommand, runCacheStatsCommand } from './commands/cache'
import { runNormalizeCommand } from './commands/normalize'
import { DEFAULT_REPORT_PATH, runRunCommand } from './commands/run'
import { parseCommandLine } from './parse-flags'

function printHelp(): void {
  console.log('Reference price matcher')
  console.log('')
  console.log('Commands:')
  console.log(
    `  run --feed <path> --stores <path> [--store <id>] [--limit N] [--refresh | --no-cache] [--out ${DEFAULT_REPORT_PATH}] [--verbose]`
  )
  console.log('  normalize --ref <reference>')
  console.log('  cache:stats [--store <id>]')
  console.log('  cache:purge [--store <id>]')
  console.log('')
  console.log('  --refresh   fetch again and overwrite cached verdicts')
  console.log('  --no-cache  fetch again without reading or writing the cache')
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2)
  const args = parseCommandLine(argv)
  if (argv.length === 0 || args.help) {
    printHelp()
    process.exit(0)
  }
  if (!args.command) {
    console.error('Missing command')
    printHelp()
    process.exit(2)
  }
  if (args.errors.length > 0) {
    for (const message of args.errors) console.error(message)
    printHelp()
    process.exit(2)
  }
  if (args.verbose) {
    setLogLevel('debug')
  }

  let exitCode = 2

  switch (args.command) {
    case 'run': {
      const controller = new AbortController()
      process.once('SIGINT', () => controller.abort())
      exitCode = await runRunCommand({
        feed: args.feed,
        stores: args.stores,
        only: args.store || undefined,
        limit: args.limit,
        refresh: args.refresh,
        noCache: args.noCache,
        out: args.out,
        signal: controller.signal,
      })
      break
    }
    case 'normalize':
      exitCode = runNormalizeCommand({ ref: args.ref })
      break
    case 'cache:stats':
      exitCode = await runCacheStatsCommand({ store: args.store })
      break
    case 'cache:purge':
      exitCode = await runCachePurgeCommand({ store: args.store })
      break
    default:
      console.error(`Unknown command: ${args.command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
