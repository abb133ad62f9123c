/**
 * Legacy plain-text import: one note per line, inline `#tags` and `[due:...]`.
 */

import { readFile } from 'node:fs/promises'
import { Ok, Err, JotlineError, errorMessage, isMissingFileError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { parseNote } from '../notes/index.js'
import type { NoteRepository, Session } from '../notes/index.js'
import type { ImportSummary } from './schemas.js'

/**
 * Each non-blank line is parsed and inserted on its own. A storage failure stops the
 * import; lines inserted before it stay.
 */
export function importLegacyText(
  repo: NoteRepository,
  session: Session,
  content: string,
): Result<ImportSummary, JotlineError> {
  const summary: ImportSummary = { imported: 0, skipped: 0 }

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim()
    if (!line) continue

    const inserted = repo.insert(session.user, parseNote(line))
    if (!inserted.ok) return inserted
    if (inserted.value) summary.imported++
    else summary.skipped++
  }

  return Ok(summary)
}

export async function importLegacyTextFile(
  repo: NoteRepository,
  session: Session,
  filePath: string,
): Promise<Result<ImportSummary, JotlineError>> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (e) {
    if (isMissingFileError(e)) return Err(JotlineError.notFound('Legacy notes file', filePath))
    return Err(JotlineError.io(errorMessage(e)))
  }
  return importLegacyText(repo, session, content)
}
