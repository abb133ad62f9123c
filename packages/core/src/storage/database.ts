/**
 * SQLite database bootstrap: opens the file, sets pragmas, brings the schema up to date.
 */

import Database from 'better-sqlite3'
import { runMigrations } from './migrations.js'

export function openDatabase(path: string): Database.Database {
  const db = new Database(path)

  // Ignored by in-memory databases, which stay in "memory" journal mode
  db.pragma('journal_mode = WAL')

  runMigrations(db)

  return db
}
