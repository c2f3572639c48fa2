/**
 * CLI entry logic. Returns the process exit code instead of exiting so the
 * whole flow can run inside tests.
 */

import {
  createSystemObservationSource,
  orderLedger,
  resolveConfig,
  runCycle,
  windowLedger,
  errorMessage,
  silentLogger,
} from '@uptime-ledger/core'
import type { CycleReport, DatabaseOpener, Logger, ObservationSource } from '@uptime-ledger/core'
import { parseArguments, toConfigOverrides } from './args.js'
import type { CliArgs } from './args.js'
import { renderCsv, renderList, renderSummary, renderTable } from './render.js'
import type { RenderOptions } from './render.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

export interface CliIo {
  stdout(text: string): void
  stderr(text: string): void
}

export interface MainDeps {
  io?: CliIo
  source?: ObservationSource
  env?: Record<string, string | undefined>
  logger?: Logger
  openDb?: DatabaseOpener
  exitProcess?: boolean
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
}

export function renderReport(report: CycleReport, args: CliArgs, options: RenderOptions): string {
  if (args.view === 'summary') return renderSummary(report.statistics, options)

  const records = orderLedger(windowLedger(report.snapshot, { since: args.since, until: args.until }), {
    keys: args.order,
    reverse: args.reverse,
  })

  switch (args.view) {
    case 'csv':
      return renderCsv(records)
    case 'table':
      return renderTable(records, options)
    case 'list':
      return renderList(records, options)
  }
}

export async function main(argv: readonly string[], deps: MainDeps = {}): Promise<number> {
  const io = deps.io ?? processIo

  let args: CliArgs
  try {
    args = await parseArguments(argv, { exitProcess: deps.exitProcess })
  } catch (e) {
    io.stderr(errorMessage(e))
    return EXIT_USAGE
  }

  const config = resolveConfig(toConfigOverrides(args), deps.env ?? process.env)
  if (!config.ok) {
    io.stderr(`Invalid configuration: ${config.error.message}`)
    return EXIT_USAGE
  }

  const logger = config.value.silent ? silentLogger : (deps.logger ?? console)
  const report = await runCycle({
    config: config.value,
    source: deps.source ?? createSystemObservationSource({ logger }),
    logger,
    openDb: deps.openDb,
  })

  if (!report.ok) {
    if (report.error.code === 'BOUNDARY_LOST') {
      io.stderr(`${report.error.message}\nThe ledger at ${config.value.dbPath} must be writable at boot; check its permissions or run with sufficient privileges.`)
    } else {
      io.stderr(report.error.message)
    }
    return EXIT_FAILURE
  }

  if (config.value.silent) return EXIT_OK

  io.stdout(renderReport(report.value, args, { utc: config.value.utc, seconds: args.seconds, kernel: args.kernel }))
  return EXIT_OK
}
