/**
 * Command-line arguments.
 */

import yargs from 'yargs/yargs'
import type { LedgerConfigInput, OrderKey } from '@uptime-ledger/core'

export type ViewMode = 'summary' | 'list' | 'table' | 'csv'

export interface CliArgs {
  file: string | undefined
  graceful: boolean
  silent: boolean
  view: ViewMode
  order: OrderKey[]
  reverse: boolean
  kernel: boolean
  seconds: boolean
  since: number | undefined
  until: number | undefined
  utc: boolean
}

/** Names accepted by --order, mapped to ledger order keys. */
const ORDER_CHOICES: Record<string, OrderKey> = {
  uptime: 'uptime',
  end: 'shutdownKind',
  downtime: 'downtime',
  kernel: 'kernel',
}

export interface ParseOptions {
  /** Let yargs exit the process after --help / --version. */
  exitProcess?: boolean
}

export async function parseArguments(argv: readonly string[], options: ParseOptions = {}): Promise<CliArgs> {
  const parsed = await yargs([...argv])
    .locale('en')
    .scriptName('uptime-ledger')
    .usage('Usage: $0 [options]\n\nRecord this boot in the session ledger and report uptime history.')
    .option('file', {
      alias: 'f',
      type: 'string',
      description: 'Ledger database path',
    })
    .option('graceful', {
      alias: 'g',
      type: 'boolean',
      description: 'Mark the running session as gracefully shut down',
      default: false,
    })
    .option('silent', {
      alias: 'q',
      type: 'boolean',
      description: 'Update the ledger without printing anything',
      default: false,
    })
    .option('list', {
      alias: 'l',
      type: 'boolean',
      description: 'List every session',
      default: false,
    })
    .option('table', {
      alias: 't',
      type: 'boolean',
      description: 'Print sessions as a table',
      default: false,
    })
    .option('csv', {
      type: 'boolean',
      description: 'Print sessions as CSV',
      default: false,
    })
    .option('order', {
      alias: 'o',
      type: 'string',
      array: true,
      choices: Object.keys(ORDER_CHOICES),
      description: 'Order sessions by these fields',
    })
    .option('reverse', {
      alias: 'r',
      type: 'boolean',
      description: 'Reverse the order',
      default: false,
    })
    .option('kernel', {
      alias: 'k',
      type: 'boolean',
      description: 'Show kernel information in the summary',
      default: false,
    })
    .option('seconds', {
      alias: 's',
      type: 'boolean',
      description: 'Print durations as raw seconds',
      default: false,
    })
    .option('since', {
      type: 'number',
      description: 'First session number to list',
    })
    .option('until', {
      type: 'number',
      description: 'Last session number to list',
    })
    .option('utc', {
      type: 'boolean',
      description: 'Print dates in UTC',
      default: false,
    })
    .check((argv) => {
      for (const name of ['since', 'until'] as const) {
        const value = argv[name]
        if (value !== undefined && !Number.isInteger(value)) {
          throw new Error(`--${name} must be a whole session number`)
        }
      }
      return true
    })
    .strict()
    .exitProcess(options.exitProcess ?? true)
    .fail((message, error) => {
      throw error ?? new Error(message)
    })
    .parseAsync()

  const view: ViewMode = parsed.csv ? 'csv' : parsed.table ? 'table' : parsed.list ? 'list' : 'summary'

  return {
    file: parsed.file,
    graceful: parsed.graceful,
    silent: parsed.silent,
    view,
    order: (parsed.order ?? []).flatMap((name) => {
      const key = ORDER_CHOICES[name]
      return key ? [key] : []
    }),
    reverse: parsed.reverse,
    kernel: parsed.kernel,
    seconds: parsed.seconds,
    since: parsed.since,
    until: parsed.until,
    utc: parsed.utc,
  }
}

/** Flags that were not given leave the environment in charge. */
export function toConfigOverrides(args: CliArgs): Partial<LedgerConfigInput> {
  return {
    dbPath: args.file,
    shutdownKind: args.graceful ? 'graceful' : undefined,
    silent: args.silent ? true : undefined,
    utc: args.utc ? true : undefined,
  }
}
