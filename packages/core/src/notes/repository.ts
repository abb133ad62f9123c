/**
 * Note repository — user-scoped CRUD and search over the `notes` table.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, JotlineError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { joinTags } from './codec.js'
import type { NoteRecord, StructuredNote } from './schemas.js'

// ── Row mapping ──

interface NoteRow {
  id: number
  user: string
  note: string
  tags: string | null
  due_date: string | null
}

const NOTE_COLUMNS = 'id, user, note, tags, due_date'

function rowToRecord(row: NoteRow): NoteRecord {
  return {
    id: row.id,
    user: row.user,
    body: row.note,
    tags: row.tags,
    dueDate: row.due_date,
  }
}

/** Escape LIKE wildcards so user input matches literally. */
function likePattern(fragment: string): string {
  return `%${fragment.replace(/[\\%_]/g, (c) => `\\${c}`)}%`
}

// ── Repository ──

export class NoteRepository {
  constructor(private db: Database.Database) {}

  /**
   * Exact-duplicate check on (user, body, joined tags, due date).
   * NULL matches only NULL, via `IS`.
   */
  isDuplicate(user: string, note: StructuredNote): Result<boolean, JotlineError> {
    try {
      const row = this.db
        .prepare('SELECT 1 FROM notes WHERE user = ? AND note = ? AND tags IS ? AND due_date IS ?')
        .get(user, note.body, joinTags(note.tags), note.dueDate)
      return Ok(row !== undefined)
    } catch (e) {
      return Err(JotlineError.db(errorMessage(e)))
    }
  }

  /** Insert unless an exact duplicate exists. `false` means skipped. */
  insert(user: string, note: StructuredNote): Result<boolean, JotlineError> {
    const dup = this.isDuplicate(user, note)
    if (!dup.ok) return dup
    if (dup.value) return Ok(false)

    try {
      this.db
        .prepare('INSERT INTO notes (user, note, tags, due_date) VALUES (?, ?, ?, ?)')
        .run(user, note.body, joinTags(note.tags), note.dueDate)
      return Ok(true)
    } catch (e) {
      return Err(JotlineError.db(errorMessage(e)))
    }
  }

  listByUser(user: string): Result<NoteRecord[], JotlineError> {
    return this.query(`SELECT ${NOTE_COLUMNS} FROM notes WHERE user = ? ORDER BY id ASC`, [user])
  }

  /** Case-insensitive substring match on the note body. */
  searchByKeyword(user: string, keyword: string): Result<NoteRecord[], JotlineError> {
    return this.query(
      `SELECT ${NOTE_COLUMNS} FROM notes WHERE user = ? AND LOWER(note) LIKE LOWER(?) ESCAPE '\\' ORDER BY id ASC`,
      [user, likePattern(keyword)],
    )
  }

  /** Substring match on the joined tag string, so `work` also finds `#homework`. */
  filterByTag(user: string, tagFragment: string): Result<NoteRecord[], JotlineError> {
    return this.query(
      `SELECT ${NOTE_COLUMNS} FROM notes WHERE user = ? AND tags LIKE ? ESCAPE '\\' ORDER BY id ASC`,
      [user, likePattern(tagFragment)],
    )
  }

  getById(user: string, id: number): Result<NoteRecord, JotlineError> {
    try {
      const row = this.db
        .prepare(`SELECT ${NOTE_COLUMNS} FROM notes WHERE id = ? AND user = ?`)
        .get(id, user) as NoteRow | undefined
      if (!row) return Err(JotlineError.notFound('Note', id))
      return Ok(rowToRecord(row))
    } catch (e) {
      return Err(JotlineError.db(errorMessage(e)))
    }
  }

  exists(user: string, id: number): Result<boolean, JotlineError> {
    try {
      const row = this.db.prepare('SELECT 1 FROM notes WHERE id = ? AND user = ?').get(id, user)
      return Ok(row !== undefined)
    } catch (e) {
      return Err(JotlineError.db(errorMessage(e)))
    }
  }

  /** `false` when no note with that id belongs to the user. */
  delete(user: string, id: number): Result<boolean, JotlineError> {
    try {
      const result = this.db.prepare('DELETE FROM notes WHERE id = ? AND user = ?').run(id, user)
      return Ok(result.changes > 0)
    } catch (e) {
      return Err(JotlineError.db(errorMessage(e)))
    }
  }

  update(user: string, id: number, note: StructuredNote): Result<NoteRecord, JotlineError> {
    const tags = joinTags(note.tags)
    try {
      const result = this.db
        .prepare('UPDATE notes SET note = ?, tags = ?, due_date = ? WHERE id = ? AND user = ?')
        .run(note.body, tags, note.dueDate, id, user)
      if (result.changes === 0) return Err(JotlineError.notFound('Note', id))
      return Ok({ id, user, body: note.body, tags, dueDate: note.dueDate })
    } catch (e) {
      return Err(JotlineError.db(errorMessage(e)))
    }
  }

  private query(sql: string, params: unknown[]): Result<NoteRecord[], JotlineError> {
    try {
      const rows = this.db.prepare(sql).all(...params) as NoteRow[]
      return Ok(rows.map(rowToRecord))
    } catch (e) {
      return Err(JotlineError.db(errorMessage(e)))
    }
  }
}
