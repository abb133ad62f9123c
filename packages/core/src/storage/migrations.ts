/**
 * Versioned SQLite schema setup.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Initial schema — notes',
    up(db) {
      // better-sqlite3 exec: runs the DDL batch, not a shell command.
      db.exec(`
        CREATE TABLE IF NOT EXISTS notes (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          user TEXT NOT NULL,
          note TEXT NOT NULL,
          tags TEXT,
          due_date TEXT
        );

        CREATE INDEX IF NOT EXISTS idx_notes_user ON notes(user);
      `)
    },
  },
]

/** Highest schema version this build knows about. */
export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1].version

export function runMigrations(db: Database.Database): void {
  db.exec(`CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  )`)

  const current = db
    .prepare('SELECT MAX(version) as version FROM schema_version')
    .get() as { version: number | null } | undefined
  const applied = current?.version ?? 0

  for (const migration of migrations) {
    if (migration.version <= applied) continue
    db.transaction(() => {
      migration.up(db)
      db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
        migration.version,
        new Date().toISOString(),
      )
    })()
  }
}
