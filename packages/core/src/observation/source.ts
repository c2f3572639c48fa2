/**
 * Observation sources — where the current boot epoch, uptime and kernel
 * label come from.
 *
 * The system source prefers the kernel's own accounting in /proc and falls
 * back to node:os when it is unavailable (non-Linux hosts, containers with
 * a masked /proc).
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import * as os from 'node:os'
import { Ok, Err, LedgerError, errorMessage } from '../common/index.js'
import type { Logger, Result } from '../common/index.js'
import { ObservationSchema } from '../ledger/index.js'
import type { Observation } from '../ledger/index.js'

export interface ObservationSource {
  observe(): Promise<Result<Observation, LedgerError>>
}

export interface SystemObservationOptions {
  /** Directory holding `uptime` and `stat`. */
  procRoot?: string
  /** Wall clock in milliseconds. */
  now?: () => number
  systemUptime?: () => number
  kernelLabel?: () => string
  logger?: Logger
}

export function defaultKernelLabel(): string {
  return `${os.type()}-${os.release()}`
}

/** First field of /proc/uptime: seconds since boot, fractional. */
export function parseProcUptime(content: string): number | null {
  const value = Number.parseFloat(content.trim().split(/\s+/)[0] ?? '')
  return Number.isFinite(value) && value >= 0 ? value : null
}

/** `btime` line of /proc/stat: boot instant in whole epoch seconds. */
export function parseProcBootTime(content: string): number | null {
  const match = content.match(/^btime\s+(\d+)\s*$/m)
  if (!match?.[1]) return null
  const value = Number.parseInt(match[1], 10)
  return Number.isSafeInteger(value) ? value : null
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8')
  } catch {
    return null
  }
}

export function createSystemObservationSource(options: SystemObservationOptions = {}): ObservationSource {
  const procRoot = options.procRoot ?? '/proc'
  const now = options.now ?? Date.now
  const systemUptime = options.systemUptime ?? os.uptime
  const kernelLabel = options.kernelLabel ?? defaultKernelLabel
  const logger = options.logger ?? console

  return {
    async observe() {
      const [uptimeText, statText] = await Promise.all([
        readOptional(join(procRoot, 'uptime')),
        readOptional(join(procRoot, 'stat')),
      ])
      const nowSeconds = now() / 1000

      let uptimeSeconds = uptimeText === null ? null : parseProcUptime(uptimeText)
      if (uptimeSeconds === null) {
        logger.info(`[observation] ${procRoot}/uptime unavailable, using os.uptime()`)
        try {
          uptimeSeconds = systemUptime()
        } catch (e) {
          return Err(LedgerError.io(`Cannot read system uptime: ${errorMessage(e)}`))
        }
      }

      const bootEpoch =
        (statText === null ? null : parseProcBootTime(statText)) ?? Math.round(nowSeconds - uptimeSeconds)

      const parsed = ObservationSchema.safeParse({ bootEpoch, uptimeSeconds, kernelLabel: kernelLabel() })
      if (!parsed.success) {
        return Err(LedgerError.validation(`Invalid observation: ${parsed.error.issues.map((i) => i.message).join('; ')}`))
      }
      return Ok(parsed.data)
    },
  }
}

/** Always reports the same reading. */
export function createStaticObservationSource(observation: Observation): ObservationSource {
  return {
    async observe() {
      const parsed = ObservationSchema.safeParse(observation)
      if (!parsed.success) {
        return Err(LedgerError.validation(`Invalid observation: ${parsed.error.issues.map((i) => i.message).join('; ')}`))
      }
      return Ok(parsed.data)
    },
  }
}
