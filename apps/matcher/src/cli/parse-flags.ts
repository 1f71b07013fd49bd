/**
 * Command line reader for the matcher CLI.
 *
 * `matcher <command> --flag value ...`. Value flags take every token up to
 * the next flag, joined by a space, so an unquoted composite reference
 * (`--ref H.085.LR1X H.085.LR2X`) survives the shell. Switches take no value.
 */

const VALUE_FLAGS = ['feed', 'stores', 'store', 'ref', 'out', 'limit'] as const
const SWITCHES = ['refresh', 'no-cache', 'verbose', 'help'] as const

type ValueFlag = (typeof VALUE_FLAGS)[number]
type Switch = (typeof SWITCHES)[number]

export interface CliArgs {
  command: string | undefined
  feed: string
  stores: string
  /** Store id filter; empty means every store */
  store: string
  ref: string
  out: string
  limit?: number
  refresh: boolean
  noCache: boolean
  verbose: boolean
  help: boolean
  /** One message per unusable flag */
  errors: string[]
}

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name)
}

function isSwitch(name: string): name is Switch {
  return SWITCHES.some((flag) => flag === name)
}

export function parseCommandLine(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    command: undefined,
    feed: '',
    stores: '',
    store: '',
    ref: '',
    out: '',
    refresh: false,
    noCache: false,
    verbose: false,
    help: false,
    errors: [],
  }

  let i = 0
  if (argv[0] !== undefined && !argv[0].startsWith('-')) {
    args.command = argv[0]
    i = 1
  }

  while (i < argv.length) {
    const token = argv[i]
    i++

    if (token === '-h') {
      args.help = true
      continue
    }
    if (!token.startsWith('--')) {
      args.errors.push(`Unexpected argument: ${token}`)
      continue
    }

    const name = token.slice(2)
    const valueTokens: string[] = []
    while (i < argv.length && !argv[i].startsWith('--')) {
      valueTokens.push(argv[i])
      i++
    }
    const value = valueTokens.join(' ')

    if (isSwitch(name)) {
      if (valueTokens.length > 0) {
        args.errors.push(`--${name} takes no value`)
      }
      setSwitch(args, name)
    } else if (isValueFlag(name)) {
      if (!value) {
        args.errors.push(`--${name} needs a value`)
      } else {
        setValue(args, name, value)
      }
    } else {
      args.errors.push(`Unknown flag: ${token}`)
    }
  }

  return args
}

function setSwitch(args: CliArgs, name: Switch): void {
  switch (name) {
    case 'refresh':
      args.refresh = true
      break
    case 'no-cache':
      args.noCache = true
      break
    case 'verbose':
      args.verbose = true
      break
    case 'help':
      args.help = true
      break
  }
}

function setValue(args: CliArgs, name: ValueFlag, value: string): void {
  if (name === 'limit') {
    const limit = /^\d+$/.test(value) ? Number.parseInt(value, 10) : NaN
    if (limit > 0) {
      args.limit = limit
    } else {
      args.errors.push(`--limit must be a positive integer, got "${value}"`)
    }
    return
  }
  args[name] = value
}
