/**
 * Version-based SQLite migrations.
 */

import type Database from 'better-sqlite3'
import { z } from 'zod'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

const VersionRowSchema = z.object({ version: z.number().int().nullable() })

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Session ledger',
    up(db) {
      // AUTOINCREMENT keeps sequence numbers from being reused after external deletes.
      db.exec(
        `
        CREATE TABLE IF NOT EXISTS sessions (
          sequence INTEGER PRIMARY KEY AUTOINCREMENT,
          boot_epoch INTEGER NOT NULL,
          uptime_seconds REAL NOT NULL,
          shutdown_epoch INTEGER NOT NULL DEFAULT -1,
          shutdown_kind TEXT NOT NULL DEFAULT 'ungraceful',
          downtime_seconds REAL NOT NULL DEFAULT -1,
          kernel_label TEXT NOT NULL DEFAULT '',
          CHECK(shutdown_kind IN ('graceful','ungraceful'))
        );
      `,
      )
    },
  },
]

export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1]?.version ?? 0

export function currentSchemaVersion(db: Database.Database): number {
  const row = VersionRowSchema.safeParse(
    db.prepare('SELECT MAX(version) as version FROM schema_version').get(),
  )
  return row.success ? (row.data.version ?? 0) : 0
}

export function runMigrations(db: Database.Database): void {
  // Ensure schema_version table exists for checking current version
  db.exec(
    `CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    )`,
  )

  const applied = currentSchemaVersion(db)

  for (const migration of migrations) {
    if (migration.version > applied) {
      db.transaction(() => {
        migration.up(db)
        db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
          migration.version,
          new Date().toISOString(),
        )
      })()
    }
  }
}
