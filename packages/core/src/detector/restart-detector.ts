/**
 * Restart detection — decides whether the host rebooted since the ledger's
 * tail was last written, and turns that decision into a store mutation.
 *
 * The decision compares the tail's boot epoch against the fresh reading:
 *
 *   restarted  ⇔  last.bootEpoch + observed.uptimeSeconds < observed.bootEpoch
 *
 * Successive boot-epoch readings within one boot drift by a few seconds
 * (tick accounting on busy or virtualized hosts). The comparison absorbs
 * drift up to the size of the current uptime, so no exact equality is needed.
 */

import { Ok, Err, LedgerError } from '../common/index.js'
import type { Logger, Result, ShutdownKind } from '../common/index.js'
import { ObservationSchema } from '../ledger/index.js'
import type {
  CloseInput,
  LedgerRepository,
  NewSessionInput,
  Observation,
  RefreshInput,
  SessionRecord,
} from '../ledger/index.js'

// ── Types ──

export type LedgerMutation =
  | { kind: 'initialize'; open: NewSessionInput }
  | { kind: 'refresh'; sequence: number; update: RefreshInput }
  | { kind: 'restart'; sequence: number; close: CloseInput; open: NewSessionInput }

export interface DetectionOutcome {
  mutation: LedgerMutation
  /** False only when a refresh could not be written (read-only storage). */
  persisted: boolean
  /** Sequence of the open record after the mutation. */
  openSequence: number
}

// ── Decision ──

export function isRestart(
  last: Pick<SessionRecord, 'bootEpoch'>,
  observed: Pick<Observation, 'bootEpoch' | 'uptimeSeconds'>,
): boolean {
  return last.bootEpoch + observed.uptimeSeconds < observed.bootEpoch
}

/** Last instant the previous boot was confirmed alive. */
export function estimateShutdown(last: Pick<SessionRecord, 'bootEpoch' | 'uptimeSeconds'>): number {
  return Math.round(last.bootEpoch + last.uptimeSeconds)
}

/**
 * `shutdownKind` is this invocation's annotation. It is written onto the
 * open record; on restart the closing record keeps the annotation the
 * previous invocation left on it.
 */
export function planMutation(
  last: SessionRecord | null,
  observed: Observation,
  shutdownKind: ShutdownKind,
): LedgerMutation {
  const open: NewSessionInput = {
    bootEpoch: observed.bootEpoch,
    uptimeSeconds: observed.uptimeSeconds,
    shutdownKind,
    kernelLabel: observed.kernelLabel,
  }

  if (!last) return { kind: 'initialize', open }

  if (!isRestart(last, observed)) {
    return {
      kind: 'refresh',
      sequence: last.sequence,
      update: {
        uptimeSeconds: observed.uptimeSeconds,
        shutdownKind,
        kernelLabel: observed.kernelLabel,
      },
    }
  }

  const shutdownEpoch = estimateShutdown(last)
  return {
    kind: 'restart',
    sequence: last.sequence,
    close: {
      shutdownEpoch,
      downtimeSeconds: observed.bootEpoch - shutdownEpoch,
      shutdownKind: last.shutdownKind,
    },
    open,
  }
}

// ── Application ──

export function applyObservation(
  repo: LedgerRepository,
  observation: Observation,
  shutdownKind: ShutdownKind,
  logger: Logger = console,
): Result<DetectionOutcome, LedgerError> {
  const parsed = ObservationSchema.safeParse(observation)
  if (!parsed.success) {
    return Err(LedgerError.validation(`Invalid observation: ${parsed.error.issues.map((i) => i.message).join('; ')}`))
  }
  const observed = parsed.data

  const last = repo.getLast()
  if (!last.ok) return last

  const mutation = planMutation(last.value, observed, shutdownKind)

  switch (mutation.kind) {
    case 'initialize': {
      const appended = repo.append(mutation.open)
      if (!appended.ok) {
        return Err(LedgerError.boundaryLost(`Cannot record first session: ${appended.error.message}`))
      }
      logger.info(`[detector] ledger initialized with session ${appended.value.sequence}`)
      return Ok({ mutation, persisted: true, openSequence: appended.value.sequence })
    }

    case 'restart': {
      const written = repo.closeAndAppend(mutation.sequence, mutation.close, mutation.open)
      if (!written.ok) {
        return Err(LedgerError.boundaryLost(`Restart detected but session ${mutation.sequence} could not be closed: ${written.error.message}`))
      }
      logger.info(
        `[detector] restart detected: closed session ${mutation.sequence}, opened ${written.value.opened.sequence} (downtime ${mutation.close.downtimeSeconds}s)`,
      )
      return Ok({ mutation, persisted: true, openSequence: written.value.opened.sequence })
    }

    case 'refresh': {
      const refreshed = repo.refresh(mutation.sequence, mutation.update)
      if (!refreshed.ok) {
        logger.warn(`[detector] could not refresh session ${mutation.sequence}, reporting from memory: ${refreshed.error.message}`)
        return Ok({ mutation, persisted: false, openSequence: mutation.sequence })
      }
      return Ok({ mutation, persisted: true, openSequence: mutation.sequence })
    }
  }
}
