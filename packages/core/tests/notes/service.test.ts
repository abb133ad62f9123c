import { describe, it, expect, beforeEach } from 'vitest'
import { openDatabase } from '../../src/storage/index.js'
import { NoteRepository } from '../../src/notes/repository.js'
import { createNote, createNoteFromText, editNote } from '../../src/notes/service.js'
import { MAX_NOTE_LENGTH } from '../../src/notes/schemas.js'
import type { Session } from '../../src/notes/schemas.js'

let repo: NoteRepository
const session: Session = { user: 'alice' }

beforeEach(() => {
  repo = new NoteRepository(openDatabase(':memory:'))
})

describe('createNote', () => {
  it('turns comma-separated tag names into # tokens', () => {
    const result = createNote(repo, session, { text: '  Plan sprint ', tags: 'work, q3', dueDate: '2025-09-01' })
    expect(result).toEqual({
      ok: true,
      value: {
        saved: true,
        note: { body: 'Plan sprint', tags: ['#work', '#q3'], dueDate: '2025-09-01' },
        warnings: [],
      },
    })
  })

  it('drops an invalid due date with a warning', () => {
    const result = createNote(repo, session, { text: 'Plan sprint', dueDate: '09/01/2025' })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.note.dueDate).toBeNull()
    expect(result.value.warnings).toEqual(['Invalid date format. Skipping due date.'])
  })

  it('rejects an empty note', () => {
    const result = createNote(repo, session, { text: '   ' })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('VALIDATION_ERROR')
      expect(result.error.message).toBe("Note can't be empty")
    }
  })

  it('rejects a note over the length limit', () => {
    const result = createNote(repo, session, { text: 'x'.repeat(MAX_NOTE_LENGTH + 1) })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe('Note too long (max 500 characters)')
  })

  it('accepts a note exactly at the limit', () => {
    expect(createNote(repo, session, { text: 'x'.repeat(MAX_NOTE_LENGTH) }).ok).toBe(true)
  })

  it('reports a duplicate as not saved', () => {
    createNote(repo, session, { text: 'same', tags: 'a' })
    const again = createNote(repo, session, { text: 'same', tags: 'a' })
    expect(again.ok && again.value.saved).toBe(false)
  })
})

describe('createNoteFromText', () => {
  it('parses inline tags and due marker', () => {
    const result = createNoteFromText(repo, session, 'Buy milk #grocery [due:2025-07-25]')
    expect(result.ok && result.value.note).toEqual({ body: 'Buy milk', tags: ['#grocery'], dueDate: '2025-07-25' })
    const stored = repo.listByUser('alice')
    expect(stored.ok && stored.value[0].tags).toBe('#grocery')
  })

  it('rejects text with nothing in it', () => {
    const result = createNoteFromText(repo, session, '   ')
    expect(result.ok).toBe(false)
  })
})

describe('editNote', () => {
  beforeEach(() => {
    createNote(repo, session, { text: 'Original', tags: 'old', dueDate: '2025-01-01' })
  })

  it('keeps current values for blank fields', () => {
    const result = editNote(repo, session, 1, {})
    expect(result).toEqual({
      ok: true,
      value: { id: 1, user: 'alice', body: 'Original', tags: '#old', dueDate: '2025-01-01' },
    })
  })

  it('replaces provided fields and comma-joins new tags', () => {
    const result = editNote(repo, session, 1, { text: 'Changed', tags: 'a,b', dueDate: '2025-02-02' })
    expect(result).toEqual({
      ok: true,
      value: { id: 1, user: 'alice', body: 'Changed', tags: '#a,#b', dueDate: '2025-02-02' },
    })
  })

  it('returns NOT_FOUND for another user\'s note', () => {
    const result = editNote(repo, { user: 'bob' }, 1, { text: 'hijack' })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('NOT_FOUND')
  })
})
