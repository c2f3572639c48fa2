/**
 * Ledger statistics — deterministic summary metrics over a patched snapshot.
 *
 * All arithmetic runs on raw values; rounding to two decimals happens once,
 * when the bundle is assembled, so repeated runs on the same data agree.
 */

import { Ok, Err, LedgerError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { isOpen } from '../ledger/index.js'
import type { SessionRecord } from '../ledger/index.js'

// ── Types ──

export interface UptimeExtreme {
  seconds: number
  bootEpoch: number
  kernelLabel: string
  sequence: number
}

export interface DowntimeExtreme {
  seconds: number
  shutdownEpoch: number
  kernelLabel: string
  sequence: number
}

export interface LedgerStatistics {
  sessionCount: number
  gracefulCount: number
  ungracefulCount: number
  firstBootEpoch: number
  currentSequence: number
  currentBootEpoch: number
  currentUptime: number
  totalUptime: number
  totalDowntime: number
  systemLifetime: number
  uptimeRatio: number
  downtimeRatio: number
  averageUptime: number
  averageDowntime: number
  maxUptime: UptimeExtreme
  minUptime: UptimeExtreme
  /** Null while the ledger holds a single (open) session. */
  maxDowntime: DowntimeExtreme | null
  minDowntime: DowntimeExtreme | null
  distinctKernelCount: number
}

// ── Helpers ──

export function round2(value: number): number {
  return Math.round(value * 100) / 100
}

/** Percentage of `part` in `whole`; zero when `whole` is not positive (clock anomalies). */
export function ratio(part: number, whole: number): number {
  if (whole <= 0) return 0
  return (100 * part) / whole
}

/** First record wins ties. */
function pickExtreme<T>(items: readonly T[], value: (item: T) => number, better: (a: number, b: number) => boolean): T | undefined {
  let best: T | undefined
  for (const item of items) {
    if (best === undefined || better(value(item), value(best))) best = item
  }
  return best
}

function uptimeExtreme(record: SessionRecord): UptimeExtreme {
  return {
    seconds: round2(record.uptimeSeconds),
    bootEpoch: record.bootEpoch,
    kernelLabel: record.kernelLabel,
    sequence: record.sequence,
  }
}

function downtimeExtreme(record: SessionRecord): DowntimeExtreme {
  return {
    seconds: round2(record.downtimeSeconds),
    shutdownEpoch: record.shutdownEpoch,
    kernelLabel: record.kernelLabel,
    sequence: record.sequence,
  }
}

const greater = (a: number, b: number): boolean => a > b
const lesser = (a: number, b: number): boolean => a < b

// ── Aggregation ──

export function computeStatistics(records: readonly SessionRecord[]): Result<LedgerStatistics, LedgerError> {
  const first = records[0]
  const tail = records[records.length - 1]
  if (!first || !tail) {
    return Err(LedgerError.validation('Cannot compute statistics over an empty ledger'))
  }

  const sessionCount = records.length
  const closed = records.filter((r) => !isOpen(r))

  const gracefulCount = closed.filter((r) => r.shutdownKind === 'graceful').length
  const ungracefulCount = sessionCount - 1 - gracefulCount

  const totalUptime = records.reduce((sum, r) => sum + r.uptimeSeconds, 0)
  const systemLifetime = tail.bootEpoch + tail.uptimeSeconds - first.bootEpoch
  const totalDowntime = sessionCount === 1 ? 0 : systemLifetime - totalUptime

  const maxUptime = pickExtreme(records, (r) => r.uptimeSeconds, greater) ?? first
  const minUptime = pickExtreme(records, (r) => r.uptimeSeconds, lesser) ?? first

  const maxDowntime = sessionCount > 1 ? pickExtreme(closed, (r) => r.downtimeSeconds, greater) : undefined
  const minDowntime = sessionCount > 1 ? pickExtreme(closed, (r) => r.downtimeSeconds, lesser) : undefined

  return Ok({
    sessionCount,
    gracefulCount,
    ungracefulCount,
    firstBootEpoch: first.bootEpoch,
    currentSequence: tail.sequence,
    currentBootEpoch: tail.bootEpoch,
    currentUptime: round2(tail.uptimeSeconds),
    totalUptime: round2(totalUptime),
    totalDowntime: round2(totalDowntime),
    systemLifetime: round2(systemLifetime),
    uptimeRatio: round2(ratio(totalUptime, systemLifetime)),
    downtimeRatio: round2(ratio(totalDowntime, systemLifetime)),
    averageUptime: round2(totalUptime / sessionCount),
    averageDowntime: round2(totalDowntime / sessionCount),
    maxUptime: uptimeExtreme(maxUptime),
    minUptime: uptimeExtreme(minUptime),
    maxDowntime: maxDowntime ? downtimeExtreme(maxDowntime) : null,
    minDowntime: minDowntime ? downtimeExtreme(minDowntime) : null,
    distinctKernelCount: new Set(records.map((r) => r.kernelLabel)).size,
  })
}
