import { describe, it, expect } from 'vitest'
import { parseArguments, toConfigOverrides } from '../src/args.js'

const parse = (argv: string[]) => parseArguments(argv, { exitProcess: false })

describe('parseArguments', () => {
  it('defaults to the summary view', async () => {
    expect(await parse([])).toEqual({
      file: undefined,
      graceful: false,
      silent: false,
      view: 'summary',
      order: [],
      reverse: false,
      kernel: false,
      seconds: false,
      since: undefined,
      until: undefined,
      utc: false,
    })
  })

  it('maps order names to ledger keys', async () => {
    const args = await parse(['-l', '-o', 'end', 'uptime', '-r'])
    expect(args.view).toBe('list')
    expect(args.order).toEqual(['shutdownKind', 'uptime'])
    expect(args.reverse).toBe(true)
  })

  it('prefers csv over table over list', async () => {
    expect((await parse(['--csv', '-t', '-l'])).view).toBe('csv')
    expect((await parse(['-t', '-l'])).view).toBe('table')
  })

  it('reads the file, flags and window', async () => {
    const args = await parse(['-f', '/tmp/ledger.db', '-g', '-q', '--since', '2', '--until', '5', '--utc'])
    expect(args).toMatchObject({ file: '/tmp/ledger.db', graceful: true, silent: true, since: 2, until: 5, utc: true })
  })

  it('rejects unknown options', async () => {
    await expect(parse(['--bogus'])).rejects.toThrow(/Unknown argument/)
  })

  it('rejects a window bound that is not a session number', async () => {
    await expect(parse(['--since', 'abc'])).rejects.toThrow('--since must be a whole session number')
    await expect(parse(['--until', '2.5'])).rejects.toThrow('--until must be a whole session number')
  })

  it('rejects unknown order keys', async () => {
    await expect(parse(['-o', 'color'])).rejects.toThrow(/Invalid values/)
  })
})

describe('toConfigOverrides', () => {
  it('leaves unset flags to the environment', async () => {
    expect(toConfigOverrides(await parse([]))).toEqual({
      dbPath: undefined,
      shutdownKind: undefined,
      silent: undefined,
      utc: undefined,
    })
  })

  it('passes given flags through', async () => {
    expect(toConfigOverrides(await parse(['-f', '/tmp/x.db', '-g', '-q', '--utc']))).toEqual({
      dbPath: '/tmp/x.db',
      shutdownKind: 'graceful',
      silent: true,
      utc: true,
    })
  })
})
