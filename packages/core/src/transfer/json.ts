/**
 * JSON export/import — an array of `{ note, tags, due_date }` objects.
 */

import { readFile, writeFile } from 'node:fs/promises'
import { Ok, Err, JotlineError, errorMessage, isMissingFileError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { serializeNote, splitTags, PERSISTED_TAG_DELIMITER } from '../notes/index.js'
import type { NoteRepository, Session } from '../notes/index.js'
import { JsonExportSchema } from './schemas.js'
import type { ImportSummary, JsonNote } from './schemas.js'

/** Free-text form of an exported item, tags comma-joined: `Finish project urgent,work [due:2025-09-01]`. */
export function buildNoteFromJson(item: JsonNote): string {
  return serializeNote(
    { body: item.note, tags: item.tags, dueDate: item.due_date },
    { tagDelimiter: PERSISTED_TAG_DELIMITER },
  )
}

export function parseJsonExport(content: string): Result<JsonNote[], JotlineError> {
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch {
    return Err(JotlineError.parse('Invalid JSON format.'))
  }

  const parsed = JsonExportSchema.safeParse(raw)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    const where = first.path.length > 0 ? ` at ${first.path.join('.')}` : ''
    return Err(JotlineError.parse(`Unexpected export shape${where}: ${first.message}`))
  }
  return Ok(parsed.data)
}

/** Items with an empty `note` are skipped. Tags and due date are stored as given. */
export function importJsonExport(
  repo: NoteRepository,
  session: Session,
  content: string,
): Result<ImportSummary, JotlineError> {
  const items = parseJsonExport(content)
  if (!items.ok) return items

  const summary: ImportSummary = { imported: 0, skipped: 0 }
  for (const [index, item] of items.value.entries()) {
    if (!item.note) {
      console.warn(`[import] item ${index}: empty note, skipped`)
      continue
    }
    const inserted = repo.insert(session.user, {
      body: item.note,
      tags: item.tags,
      dueDate: item.due_date || null,
    })
    if (!inserted.ok) return inserted
    if (inserted.value) summary.imported++
    else summary.skipped++
  }

  return Ok(summary)
}

export async function importJsonExportFile(
  repo: NoteRepository,
  session: Session,
  filePath: string,
): Promise<Result<ImportSummary, JotlineError>> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (e) {
    if (isMissingFileError(e)) return Err(JotlineError.notFound('JSON export', filePath))
    return Err(JotlineError.io(errorMessage(e)))
  }
  return importJsonExport(repo, session, content)
}

function collectExport(repo: NoteRepository, session: Session): Result<JsonNote[], JotlineError> {
  const records = repo.listByUser(session.user)
  if (!records.ok) return records

  return Ok(
    records.value.map((r) => ({
      note: r.body,
      tags: splitTags(r.tags),
      due_date: r.dueDate,
    })),
  )
}

/** Pretty-printed with 4-space indentation. */
export function exportNotesToJson(repo: NoteRepository, session: Session): Result<string, JotlineError> {
  const data = collectExport(repo, session)
  if (!data.ok) return data
  return Ok(JSON.stringify(data.value, null, 4))
}

/** Write the export file. Returns the number of notes written. */
export async function exportNotesToJsonFile(
  repo: NoteRepository,
  session: Session,
  filePath: string,
): Promise<Result<number, JotlineError>> {
  const data = collectExport(repo, session)
  if (!data.ok) return data

  try {
    await writeFile(filePath, JSON.stringify(data.value, null, 4), 'utf8')
  } catch (e) {
    return Err(JotlineError.io(errorMessage(e)))
  }
  return Ok(data.value.length)
}
