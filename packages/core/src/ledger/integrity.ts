/**
 * Structural checks over a ledger snapshot. Findings are reported, never
 * repaired: the ledger is append-mostly and history is not rewritten.
 */

import { isOpen } from './schemas.js'
import type { SessionRecord } from './schemas.js'

export interface LedgerIntegrity {
  rowCount: number
  tailSequence: number
  /** Sequence numbers handed out but no longer present (rows deleted outside this tool). */
  missingRows: number
  /** Open records other than the tail. */
  strayOpenSequences: number[]
  /** Records that booted earlier than the record before them. */
  bootRegressions: number[]
}

export function checkIntegrity(records: readonly SessionRecord[]): LedgerIntegrity {
  const tail = records[records.length - 1]
  const tailSequence = tail?.sequence ?? 0

  const strayOpenSequences: number[] = []
  const bootRegressions: number[] = []

  records.forEach((record, index) => {
    if (record !== tail && isOpen(record)) strayOpenSequences.push(record.sequence)
    const previous = index > 0 ? records[index - 1] : undefined
    if (previous && record.bootEpoch < previous.bootEpoch) bootRegressions.push(record.sequence)
  })

  return {
    rowCount: records.length,
    tailSequence,
    missingRows: Math.max(0, tailSequence - records.length),
    strayOpenSequences,
    bootRegressions,
  }
}

export function isHealthy(integrity: LedgerIntegrity): boolean {
  return (
    integrity.missingRows === 0 &&
    integrity.strayOpenSequences.length === 0 &&
    integrity.bootRegressions.length === 0
  )
}
