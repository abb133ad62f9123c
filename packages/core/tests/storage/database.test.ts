import { describe, it, expect } from 'vitest'
import { openDatabase, runMigrations, LATEST_SCHEMA_VERSION } from '../../src/storage/index.js'

describe('openDatabase', () => {
  it('creates the notes and schema_version tables', () => {
    const db = openDatabase(':memory:')

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as { name: string }[]
    const tableNames = tables.map((t) => t.name)

    expect(tableNames).toContain('notes')
    expect(tableNames).toContain('schema_version')

    db.close()
  })

  it('indexes notes by user', () => {
    const db = openDatabase(':memory:')
    const indexes = db
      .prepare("SELECT name FROM sqlite_master WHERE type='index' AND tbl_name = 'notes'")
      .all() as { name: string }[]
    expect(indexes.map((i) => i.name)).toContain('idx_notes_user')
    db.close()
  })

  it('in-memory databases report "memory" journal mode', () => {
    const db = openDatabase(':memory:')
    const result = db.pragma('journal_mode') as { journal_mode: string }[]
    expect(result[0]?.journal_mode).toBe('memory')
    db.close()
  })

  it('records the latest schema version', () => {
    const db = openDatabase(':memory:')
    const row = db.prepare('SELECT MAX(version) as version FROM schema_version').get() as { version: number }
    expect(row.version).toBe(LATEST_SCHEMA_VERSION)
    expect(LATEST_SCHEMA_VERSION).toBe(1)
    db.close()
  })

  it('running migrations again is a no-op', () => {
    const db = openDatabase(':memory:')
    runMigrations(db)
    const row = db.prepare('SELECT COUNT(*) as n FROM schema_version').get() as { n: number }
    expect(row.n).toBe(1)
    db.close()
  })
})
