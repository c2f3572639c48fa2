/**
 * Storage — SQLite database, migrations.
 */

export { openDatabase, IN_MEMORY } from './database.js'
export type { OpenDatabaseOptions } from './database.js'
export { runMigrations, currentSchemaVersion, LATEST_SCHEMA_VERSION } from './migrations.js'
