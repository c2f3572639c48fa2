/**
 * Ledger repository — the session table.
 * Appends, refreshes the open tail, and closes it together with the next
 * append inside one transaction.
 */

import type Database from 'better-sqlite3'
import { z } from 'zod'
import { Ok, Err, LedgerError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import {
  CloseInputSchema,
  NewSessionInputSchema,
  OPEN_SENTINEL,
  RefreshInputSchema,
  SessionRecordSchema,
} from './schemas.js'
import type {
  CloseInput,
  NewSessionInput,
  RefreshInput,
  SessionRecord,
} from './schemas.js'

// ── Row mapping ──

const SessionRowSchema = z.object({
  sequence: z.number(),
  boot_epoch: z.number(),
  uptime_seconds: z.number(),
  shutdown_epoch: z.number(),
  shutdown_kind: z.string(),
  downtime_seconds: z.number(),
  kernel_label: z.string(),
})

type SessionRow = z.infer<typeof SessionRowSchema>

function rowToRecord(row: SessionRow): Result<SessionRecord, LedgerError> {
  const parsed = SessionRecordSchema.safeParse({
    sequence: row.sequence,
    bootEpoch: row.boot_epoch,
    uptimeSeconds: row.uptime_seconds,
    shutdownEpoch: row.shutdown_epoch,
    shutdownKind: row.shutdown_kind,
    downtimeSeconds: row.downtime_seconds,
    kernelLabel: row.kernel_label,
  })
  if (!parsed.success) {
    return Err(LedgerError.validation(`Malformed session ${row.sequence}: ${parsed.error.issues.map((i) => i.message).join('; ')}`))
  }
  return Ok(parsed.data)
}

function parseRow(raw: unknown): Result<SessionRecord, LedgerError> {
  const row = SessionRowSchema.safeParse(raw)
  if (!row.success) {
    return Err(LedgerError.validation(`Unreadable session row: ${row.error.issues.map((i) => i.message).join('; ')}`))
  }
  return rowToRecord(row.data)
}

function validationError(error: z.ZodError): LedgerError {
  return LedgerError.validation(error.issues.map((i) => i.message).join('; '))
}

// ── Repository ──

export class LedgerRepository {
  constructor(private db: Database.Database) {}

  get readonly(): boolean {
    return this.db.readonly
  }

  /** Every record in ledger order. */
  getAll(): Result<SessionRecord[], LedgerError> {
    let rows: unknown[]
    try {
      rows = this.db.prepare('SELECT * FROM sessions ORDER BY sequence ASC').all()
    } catch (e) {
      return Err(LedgerError.db(errorMessage(e)))
    }

    const records: SessionRecord[] = []
    for (const raw of rows) {
      const record = parseRow(raw)
      if (!record.ok) return record
      records.push(record.value)
    }
    return Ok(records)
  }

  getLast(): Result<SessionRecord | null, LedgerError> {
    let raw: unknown
    try {
      raw = this.db.prepare('SELECT * FROM sessions ORDER BY sequence DESC LIMIT 1').get()
    } catch (e) {
      return Err(LedgerError.db(errorMessage(e)))
    }
    if (raw === undefined) return Ok(null)
    return parseRow(raw)
  }

  append(input: NewSessionInput): Result<SessionRecord, LedgerError> {
    const parsed = NewSessionInputSchema.safeParse(input)
    if (!parsed.success) return Err(validationError(parsed.error))

    try {
      return Ok(this.insertOpen(parsed.data))
    } catch (e) {
      return Err(LedgerError.db(errorMessage(e)))
    }
  }

  /** Refreshes the open record identified by `sequence` in place. */
  refresh(sequence: number, input: RefreshInput): Result<SessionRecord, LedgerError> {
    const parsed = RefreshInputSchema.safeParse(input)
    if (!parsed.success) return Err(validationError(parsed.error))

    const current = this.getBySequence(sequence)
    if (!current.ok) return current

    const data = parsed.data
    try {
      this.db
        .prepare(
          'UPDATE sessions SET uptime_seconds = ?, shutdown_kind = ?, kernel_label = ? WHERE sequence = ?',
        )
        .run(data.uptimeSeconds, data.shutdownKind, data.kernelLabel, sequence)
    } catch (e) {
      return Err(LedgerError.db(errorMessage(e)))
    }

    return Ok({ ...current.value, ...data })
  }

  /**
   * Closes the record identified by `sequence` and appends the next open
   * record. Both writes commit or neither does.
   */
  closeAndAppend(
    sequence: number,
    close: CloseInput,
    next: NewSessionInput,
  ): Result<{ closed: SessionRecord; opened: SessionRecord }, LedgerError> {
    const closeParsed = CloseInputSchema.safeParse(close)
    if (!closeParsed.success) return Err(validationError(closeParsed.error))
    const nextParsed = NewSessionInputSchema.safeParse(next)
    if (!nextParsed.success) return Err(validationError(nextParsed.error))

    const current = this.getBySequence(sequence)
    if (!current.ok) return current

    const closeData = closeParsed.data
    try {
      const opened = this.db.transaction(() => {
        this.db
          .prepare(
            'UPDATE sessions SET shutdown_epoch = ?, downtime_seconds = ?, shutdown_kind = ? WHERE sequence = ?',
          )
          .run(closeData.shutdownEpoch, closeData.downtimeSeconds, closeData.shutdownKind, sequence)
        return this.insertOpen(nextParsed.data)
      })()
      return Ok({ closed: { ...current.value, ...closeData }, opened })
    } catch (e) {
      return Err(LedgerError.db(errorMessage(e)))
    }
  }

  count(): Result<number, LedgerError> {
    try {
      const row = z
        .object({ total: z.number() })
        .safeParse(this.db.prepare('SELECT COUNT(*) AS total FROM sessions').get())
      return row.success ? Ok(row.data.total) : Err(LedgerError.db('COUNT returned no row'))
    } catch (e) {
      return Err(LedgerError.db(errorMessage(e)))
    }
  }

  private getBySequence(sequence: number): Result<SessionRecord, LedgerError> {
    let raw: unknown
    try {
      raw = this.db.prepare('SELECT * FROM sessions WHERE sequence = ?').get(sequence)
    } catch (e) {
      return Err(LedgerError.db(errorMessage(e)))
    }
    if (raw === undefined) return Err(LedgerError.validation(`Session not found: ${sequence}`))
    return parseRow(raw)
  }

  /** Throws on write failure; callers translate. */
  private insertOpen(input: z.output<typeof NewSessionInputSchema>): SessionRecord {
    const info = this.db
      .prepare(
        `INSERT INTO sessions (boot_epoch, uptime_seconds, shutdown_epoch, shutdown_kind, downtime_seconds, kernel_label)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(input.bootEpoch, input.uptimeSeconds, OPEN_SENTINEL, input.shutdownKind, OPEN_SENTINEL, input.kernelLabel)

    return {
      sequence: Number(info.lastInsertRowid),
      bootEpoch: input.bootEpoch,
      uptimeSeconds: input.uptimeSeconds,
      shutdownEpoch: OPEN_SENTINEL,
      shutdownKind: input.shutdownKind,
      downtimeSeconds: OPEN_SENTINEL,
      kernelLabel: input.kernelLabel,
    }
  }
}
