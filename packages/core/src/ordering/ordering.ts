/**
 * Ledger ordering for listings.
 *
 * Selected keys form a single tuple compared in a fixed precedence
 * (uptime, shutdown kind, downtime, kernel), whatever order the caller
 * names them in. Ascending by default; `reverse` flips the final result.
 */

import { z } from 'zod'
import type { SessionRecord } from '../ledger/index.js'

const OrderKeySchema = z.enum(['uptime', 'shutdownKind', 'downtime', 'kernel'])
export type OrderKey = z.infer<typeof OrderKeySchema>

const ORDER_PRECEDENCE: readonly OrderKey[] = OrderKeySchema.options

export interface OrderOptions {
  keys?: readonly OrderKey[]
  reverse?: boolean
}

export interface WindowOptions {
  since?: number
  until?: number
}

// Unclean shutdowns sort ahead of clean ones.
const KIND_RANK: Record<SessionRecord['shutdownKind'], number> = {
  ungraceful: 0,
  graceful: 1,
}

function compareKey(a: SessionRecord, b: SessionRecord, key: OrderKey): number {
  switch (key) {
    case 'uptime':
      return a.uptimeSeconds - b.uptimeSeconds
    case 'shutdownKind':
      return KIND_RANK[a.shutdownKind] - KIND_RANK[b.shutdownKind]
    case 'downtime':
      return a.downtimeSeconds - b.downtimeSeconds
    case 'kernel':
      return a.kernelLabel < b.kernelLabel ? -1 : a.kernelLabel > b.kernelLabel ? 1 : 0
  }
}

export function orderLedger(records: readonly SessionRecord[], options: OrderOptions = {}): SessionRecord[] {
  const selected = new Set(options.keys ?? [])
  const keys = ORDER_PRECEDENCE.filter((key) => selected.has(key))

  const ordered = [...records].sort((a, b) => {
    for (const key of keys) {
      const diff = compareKey(a, b, key)
      if (diff !== 0) return diff
    }
    return a.sequence - b.sequence
  })

  return options.reverse ? ordered.reverse() : ordered
}

/** Records whose sequence falls inside the inclusive window. */
export function windowLedger(records: readonly SessionRecord[], options: WindowOptions = {}): SessionRecord[] {
  const since = options.since ?? Number.NEGATIVE_INFINITY
  const until = options.until ?? Number.POSITIVE_INFINITY
  return records.filter((r) => r.sequence >= since && r.sequence <= until)
}
