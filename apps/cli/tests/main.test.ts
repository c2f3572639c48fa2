import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createStaticObservationSource, openDatabase, silentLogger } from '@uptime-ledger/core'
import type { DatabaseOpener, Observation } from '@uptime-ledger/core'
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, main } from '../src/main.js'

let dir: string
let dbPath: string
let stdout: string[]
let stderr: string[]

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'uptime-ledger-cli-'))
  dbPath = join(dir, 'ledger.db')
  stdout = []
  stderr = []
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
})

function run(argv: string[], observation: Observation, extra: { env?: Record<string, string>; openDb?: DatabaseOpener } = {}): Promise<number> {
  return main(['-f', dbPath, '--utc', ...argv], {
    io: { stdout: (text) => stdout.push(text), stderr: (text) => stderr.push(text) },
    source: createStaticObservationSource(observation),
    env: extra.env ?? {},
    logger: silentLogger,
    openDb: extra.openDb,
    exitProcess: false,
  })
}

describe('main', () => {
  it('records the boot and prints the summary', async () => {
    const code = await run([], { bootEpoch: 1000, uptimeSeconds: 200, kernelLabel: 'k1' })

    expect(code).toBe(EXIT_OK)
    expect(existsSync(dbPath)).toBe(true)
    expect(stdout).toHaveLength(1)
    expect(stdout[0]?.split('\n')[0]).toBe('System startups:    1 since 1970-01-01 00:16:40')
  })

  it('updates silently', async () => {
    const code = await run(['-q'], { bootEpoch: 1000, uptimeSeconds: 200, kernelLabel: 'k1' })
    expect(code).toBe(EXIT_OK)
    expect(stdout).toEqual([])
    expect(existsSync(dbPath)).toBe(true)
  })

  it('prints ordered CSV', async () => {
    await run(['-q'], { bootEpoch: 1000, uptimeSeconds: 500, kernelLabel: 'k1' })
    await run(['-q'], { bootEpoch: 1600, uptimeSeconds: 10, kernelLabel: 'k2' })
    const code = await run(['--csv', '-o', 'uptime'], { bootEpoch: 1600, uptimeSeconds: 20, kernelLabel: 'k2' })

    expect(code).toBe(EXIT_OK)
    expect(stdout[0]?.split('\n')).toEqual([
      'sequence,boot_epoch,uptime_seconds,shutdown_epoch,shutdown_kind,downtime_seconds,kernel_label',
      '2,1600,20,-1,ungraceful,-1,k2',
      '1,1000,500,1500,ungraceful,100,k1',
    ])
  })

  it('limits listings to the session window', async () => {
    await run(['-q'], { bootEpoch: 1000, uptimeSeconds: 500, kernelLabel: 'k1' })
    await run(['-q'], { bootEpoch: 1600, uptimeSeconds: 10, kernelLabel: 'k2' })
    await run(['--csv', '--since', '2'], { bootEpoch: 1600, uptimeSeconds: 20, kernelLabel: 'k2' })

    expect(stdout[0]?.split('\n').slice(1)).toEqual(['2,1600,20,-1,ungraceful,-1,k2'])
  })

  it('exits non-zero when a restart cannot be recorded', async () => {
    await run(['-q'], { bootEpoch: 1000, uptimeSeconds: 500, kernelLabel: 'k1' })

    const readOnly: DatabaseOpener = (path, options) => {
      if (!options?.readonly) throw new Error('permission denied')
      return openDatabase(path, options)
    }
    const code = await run([], { bootEpoch: 1600, uptimeSeconds: 10, kernelLabel: 'k1' }, { openDb: readOnly })

    expect(code).toBe(EXIT_FAILURE)
    expect(stdout).toEqual([])
    expect(stderr[0]?.split('\n')[1]).toBe(
      `The ledger at ${dbPath} must be writable at boot; check its permissions or run with sufficient privileges.`,
    )
  })

  it('exits with a usage error for bad arguments', async () => {
    const code = await run(['--bogus'], { bootEpoch: 1000, uptimeSeconds: 1, kernelLabel: 'k' })
    expect(code).toBe(EXIT_USAGE)
    expect(stderr).toHaveLength(1)
  })

  it('exits with a usage error for a malformed window', async () => {
    const code = await run(['-l', '--since', 'abc'], { bootEpoch: 1000, uptimeSeconds: 1, kernelLabel: 'k' })
    expect(code).toBe(EXIT_USAGE)
    expect(stdout).toEqual([])
    expect(stderr).toEqual(['--since must be a whole session number'])
  })

  it('exits with a usage error for bad environment', async () => {
    const code = await run([], { bootEpoch: 1000, uptimeSeconds: 1, kernelLabel: 'k' }, { env: { UPTIME_LEDGER_UTC: 'maybe' } })
    expect(code).toBe(EXIT_USAGE)
    expect(stderr).toEqual(['Invalid configuration: UPTIME_LEDGER_UTC must be a boolean, got "maybe"'])
  })
})
