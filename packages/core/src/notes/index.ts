/**
 * Notes — text codec, due-date views, repository, and input handling.
 */

export {
  MAX_NOTE_LENGTH,
  DueModeSchema,
  CreateNoteInputSchema,
  EditNoteInputSchema,
} from './schemas.js'

export type {
  StructuredNote,
  NoteRecord,
  Session,
  DueMode,
  CreateNoteInput,
  EditNoteInput,
} from './schemas.js'

export {
  DUE_MARKER,
  PERSISTED_TAG_DELIMITER,
  parseNote,
  serializeNote,
  joinTags,
  splitTags,
  parseTagList,
  recordToStructuredNote,
} from './codec.js'

export type { SerializeOptions } from './codec.js'

export {
  WEEK_WINDOW_DAYS,
  todayISO,
  parseISODate,
  isValidISODate,
  matchesDueMode,
  classifyDueNotes,
  summarizeDueAlerts,
} from './due-dates.js'

export type { DueAlertSummary } from './due-dates.js'

export { NoteRepository } from './repository.js'

export { createNote, createNoteFromText, editNote } from './service.js'
export type { CreateNoteOutcome } from './service.js'
