/**
 * Note operations that sit between user input and the repository.
 */

import { Err, JotlineError, mapOk } from '../common/index.js'
import type { Result } from '../common/index.js'
import { parseNote, parseTagList, splitTags } from './codec.js'
import { isValidISODate } from './due-dates.js'
import type { NoteRepository } from './repository.js'
import { CreateNoteInputSchema, EditNoteInputSchema } from './schemas.js'
import type { CreateNoteInput, EditNoteInput, NoteRecord, Session, StructuredNote } from './schemas.js'

export interface CreateNoteOutcome {
  /** `false` when an identical note already existed. */
  saved: boolean
  note: StructuredNote
  warnings: string[]
}

function validationMessage(issues: { message: string }[]): string {
  return issues.map((i) => i.message).join('; ')
}

/**
 * Create a note from separately entered fields.
 * Tags are a comma-separated list of bare names; an invalid due date is dropped with a warning.
 */
export function createNote(
  repo: NoteRepository,
  session: Session,
  input: CreateNoteInput,
): Result<CreateNoteOutcome, JotlineError> {
  const parsed = CreateNoteInputSchema.safeParse(input)
  if (!parsed.success) {
    return Err(JotlineError.validation(validationMessage(parsed.error.issues)))
  }

  const warnings: string[] = []
  let dueDate: string | null = null
  if (parsed.data.dueDate) {
    if (isValidISODate(parsed.data.dueDate)) dueDate = parsed.data.dueDate
    else warnings.push('Invalid date format. Skipping due date.')
  }

  const note: StructuredNote = {
    body: parsed.data.text,
    tags: parseTagList(parsed.data.tags),
    dueDate,
  }

  return mapOk(repo.insert(session.user, note), (saved) => ({ saved, note, warnings }))
}

/** Create a note from one line of free text with inline `#tags` and `[due:...]`. */
export function createNoteFromText(
  repo: NoteRepository,
  session: Session,
  raw: string,
): Result<CreateNoteOutcome, JotlineError> {
  const note = parseNote(raw)
  if (!note.body && note.tags.length === 0 && !note.dueDate) {
    return Err(JotlineError.validation("Note can't be empty"))
  }
  return mapOk(repo.insert(session.user, note), (saved) => ({ saved, note, warnings: [] }))
}

/** Blank fields keep the current value. */
export function editNote(
  repo: NoteRepository,
  session: Session,
  id: number,
  changes: EditNoteInput,
): Result<NoteRecord, JotlineError> {
  const parsed = EditNoteInputSchema.safeParse(changes)
  if (!parsed.success) {
    return Err(JotlineError.validation(validationMessage(parsed.error.issues)))
  }

  const current = repo.getById(session.user, id)
  if (!current.ok) return current

  const newTags = parseTagList(parsed.data.tags)
  const next: StructuredNote = {
    body: parsed.data.text || current.value.body,
    tags: newTags.length > 0 ? newTags : splitTags(current.value.tags),
    dueDate: parsed.data.dueDate || current.value.dueDate,
  }

  return repo.update(session.user, id, next)
}
