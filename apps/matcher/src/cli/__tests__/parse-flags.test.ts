import { describe, expect, it } from 'vitest'
import { parseCommandLine } from '../parse-flags'

describe('parseCommandLine', () => {
  it('reads the command and its flags', () => {
    const args = parseCommandLine([
      'run',
      '--feed',
      'feed.xml',
      '--stores',
      'stores.json',
      '--limit',
      '20',
      '--refresh',
    ])

    expect(args).toMatchObject({
      command: 'run',
      feed: 'feed.xml',
      stores: 'stores.json',
      limit: 20,
      refresh: true,
      noCache: false,
      errors: [],
    })
  })

  it('joins the tokens of an unquoted composite reference', () => {
    const args = parseCommandLine(['normalize', '--ref', 'H.085.LR1X', 'H.085.LR2X', '--verbose'])

    expect(args.ref).toBe('H.085.LR1X H.085.LR2X')
    expect(args.verbose).toBe(true)
  })

  it('reads --no-cache', () => {
    expect(parseCommandLine(['run', '--no-cache']).noCache).toBe(true)
  })

  it('defaults every flag', () => {
    const args = parseCommandLine(['cache:stats'])

    expect(args).toEqual({
      command: 'cache:stats',
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
    })
  })

  it('has no command when the line starts with a flag', () => {
    const args = parseCommandLine(['-h'])

    expect(args.command).toBeUndefined()
    expect(args.help).toBe(true)
  })

  it.each([
    [['run', '--limit', 'ten'], '--limit must be a positive integer, got "ten"'],
    [['run', '--limit', '0'], '--limit must be a positive integer, got "0"'],
    [['run', '--feed'], '--feed needs a value'],
    [['run', '--refresh', 'yes'], '--refresh takes no value'],
    [['run', '--fast'], 'Unknown flag: --fast'],
    [['run', 'extra'], 'Unexpected argument: extra'],
  ])('reports %j', (argv, message) => {
    const args = parseCommandLine(argv)

    expect(args.errors).toEqual([message])
    expect(args.limit).toBeUndefined()
  })
})
