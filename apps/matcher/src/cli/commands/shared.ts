import { ZodError } from 'zod'
import { loadEngineConfig } from '../../config/settings'
import type { EngineConfig } from '../../config/settings'
import { loggers } from '../../config/logger'
import type { ILogger } from '../../config/logger'
import { classifyError, errorLogMeta } from '../../errors'

export interface CommandEnvironment {
  /** Defaults to process.env */
  env?: Record<string, string | undefined>
  /** Relative paths resolve against this directory */
  cwd?: string
  /** Passed to every component; each uses its own logger when absent */
  logger?: ILogger
}

/**
 * Engine configuration, or null after printing why it is invalid.
 */
export function loadConfig(environment: CommandEnvironment): EngineConfig | null {
  try {
    return loadEngineConfig(environment.env ?? process.env)
  } catch (error) {
    if (!(error instanceof ZodError)) throw error
    console.error('Invalid configuration:')
    for (const issue of error.issues) {
      console.error(`  ${issue.path.join('.')}: ${issue.message}`)
    }
    return null
  }
}

/**
 * Print a command failure and map it to an exit code: 2 for expected
 * failures (bad input, config, storage), 1 for bugs.
 */
export function reportFailure(command: string, error: unknown, logger: ILogger = loggers.cli): number {
  const classified = classifyError(error)
  logger.error('CLI_COMMAND_FAILED', { command, ...errorLogMeta(error) })
  console.error(classified.message)
  return classified.isOperational ? 2 : 1
}
