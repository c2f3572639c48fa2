/**
 * Live-tail override. Storage may lag the host (read-only ledger, or a
 * refresh that failed to commit), so reports overlay the fresh observation
 * onto the snapshot's tail instead of trusting the stored values.
 */

import type { ShutdownKind } from '../common/index.js'
import type { Observation, SessionRecord } from '../ledger/index.js'

export interface TailOverride {
  uptimeSeconds: number
  shutdownKind: ShutdownKind
  kernelLabel: string
}

export function overrideFromObservation(observation: Observation, shutdownKind: ShutdownKind): TailOverride {
  return {
    uptimeSeconds: observation.uptimeSeconds,
    shutdownKind,
    kernelLabel: observation.kernelLabel,
  }
}

/** Returns a new snapshot with the tail replaced; the input is left untouched. */
export function patchSnapshot(records: readonly SessionRecord[], override: TailOverride): SessionRecord[] {
  const tail = records[records.length - 1]
  if (!tail) return []
  return [...records.slice(0, -1), { ...tail, ...override }]
}
