/**
 * SQLite database initialization and migrations.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import { runMigrations } from './migrations.js'

export interface OpenDatabaseOptions {
  /** Open without write access; migrations are skipped. */
  readonly?: boolean
}

export const IN_MEMORY = ':memory:'

export function openDatabase(path: string, options: OpenDatabaseOptions = {}): Database.Database {
  const readonly = options.readonly ?? false

  if (!readonly && path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true })
  }

  const db = new Database(path, { readonly, fileMustExist: readonly })

  if (!db.readonly) {
    // Rollback journal: a read-only opener needs no -shm/-wal files beside the ledger.
    db.pragma('journal_mode = DELETE')
    db.pragma('synchronous = FULL')
    runMigrations(db)
  }

  return db
}
