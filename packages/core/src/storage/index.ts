/**
 * Storage — SQLite database and schema setup.
 */

export { openDatabase } from './database.js'
export { runMigrations, LATEST_SCHEMA_VERSION } from './migrations.js'
