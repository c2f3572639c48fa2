/**
 * One invocation: observe the host, reconcile the ledger, and build the
 * report the presentation layer renders.
 */

import { existsSync } from 'node:fs'
import type Database from 'better-sqlite3'
import { Ok, Err, LedgerError, errorMessage, silentLogger } from '../common/index.js'
import type { Logger, Result } from '../common/index.js'
import type { LedgerConfig } from '../config/index.js'
import { applyObservation } from '../detector/index.js'
import type { DetectionOutcome } from '../detector/index.js'
import { LedgerRepository, checkIntegrity } from '../ledger/index.js'
import type { LedgerIntegrity, SessionRecord } from '../ledger/index.js'
import type { ObservationSource } from '../observation/index.js'
import { computeStatistics, overrideFromObservation, patchSnapshot } from '../stats/index.js'
import type { LedgerStatistics } from '../stats/index.js'
import { openDatabase, IN_MEMORY } from '../storage/index.js'
import type { OpenDatabaseOptions } from '../storage/index.js'

export interface CycleReport {
  outcome: DetectionOutcome
  /** Ledger in sequence order with the live observation applied to the tail. */
  snapshot: SessionRecord[]
  statistics: LedgerStatistics
  integrity: LedgerIntegrity
  /** The ledger could only be opened read-only. */
  readonly: boolean
}

export type DatabaseOpener = (path: string, options?: OpenDatabaseOptions) => Database.Database

export interface RunCycleOptions {
  config: LedgerConfig
  source: ObservationSource
  logger?: Logger
  openDb?: DatabaseOpener
}

function openLedger(path: string, openDb: DatabaseOpener, logger: Logger): Result<Database.Database, LedgerError> {
  try {
    return Ok(openDb(path))
  } catch (e) {
    if (path === IN_MEMORY || !existsSync(path)) {
      return Err(LedgerError.io(`Cannot open ledger at ${path}: ${errorMessage(e)}`))
    }
    logger.warn(`[cycle] ledger at ${path} is not writable, opening read-only: ${errorMessage(e)}`)
  }

  try {
    return Ok(openDb(path, { readonly: true }))
  } catch (e) {
    return Err(LedgerError.io(`Cannot open ledger at ${path}: ${errorMessage(e)}`))
  }
}

function reportIntegrity(integrity: LedgerIntegrity, logger: Logger): void {
  if (integrity.missingRows > 0) {
    logger.warn(`[cycle] ${integrity.missingRows} session(s) missing: tail is ${integrity.tailSequence} but ${integrity.rowCount} rows remain`)
  }
  if (integrity.strayOpenSequences.length > 0) {
    logger.warn(`[cycle] sessions left open before the tail: ${integrity.strayOpenSequences.join(', ')}`)
  }
  if (integrity.bootRegressions.length > 0) {
    logger.warn(`[cycle] boot time went backwards at session(s) ${integrity.bootRegressions.join(', ')}; statistics may be skewed`)
  }
}

export async function runCycle(options: RunCycleOptions): Promise<Result<CycleReport, LedgerError>> {
  const { config, source } = options
  const logger = config.silent ? silentLogger : (options.logger ?? console)
  const openDb = options.openDb ?? openDatabase

  const observation = await source.observe()
  if (!observation.ok) return observation

  const opened = openLedger(config.dbPath, openDb, logger)
  if (!opened.ok) return opened
  const db = opened.value

  try {
    const repo = new LedgerRepository(db)

    const outcome = applyObservation(repo, observation.value, config.shutdownKind, logger)
    if (!outcome.ok) return outcome

    const records = repo.getAll()
    if (!records.ok) return records

    const integrity = checkIntegrity(records.value)
    reportIntegrity(integrity, logger)

    const snapshot = patchSnapshot(records.value, overrideFromObservation(observation.value, config.shutdownKind))
    const statistics = computeStatistics(snapshot)
    if (!statistics.ok) return statistics

    return Ok({
      outcome: outcome.value,
      snapshot,
      statistics: statistics.value,
      integrity,
      readonly: repo.readonly,
    })
  } finally {
    db.close()
  }
}
