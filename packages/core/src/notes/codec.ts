/**
 * Free-text note codec.
 *
 * A raw note looks like `Buy milk #grocery #urgent [due:2025-07-25]`. Parsing pulls
 * out `#` tokens as tags and the text of the last `[due:` marker as the due date;
 * serializing puts them back in `body tags marker` order.
 *
 * The two directions are not exact inverses: a tag containing the join delimiter,
 * or a `#word` meant as prose, does not survive a round trip. Existing exports
 * depend on this format, so it stays as is.
 */

import type { NoteRecord, StructuredNote } from './schemas.js'

export const DUE_MARKER = '[due:'

/** Delimiter used for the persisted tags column and the JSON rebuild. */
export const PERSISTED_TAG_DELIMITER = ','

export interface SerializeOptions {
  /** `' '` (default) yields text `parseNote` reads back; `','` matches the persisted form. */
  tagDelimiter?: string
}

export function parseNote(raw: string): StructuredNote {
  let notePart = raw
  let dueDate: string | null = null

  const markerAt = raw.lastIndexOf(DUE_MARKER)
  if (markerAt !== -1) {
    notePart = raw.slice(0, markerAt)
    let chunk = raw.slice(markerAt + DUE_MARKER.length)
    if (chunk.endsWith(']')) chunk = chunk.slice(0, -1)
    dueDate = chunk.trim()
  }

  const tags: string[] = []
  const words: string[] = []
  for (const token of notePart.split(/\s+/)) {
    if (!token) continue
    if (token.startsWith('#')) tags.push(token)
    else words.push(token)
  }

  return { body: words.join(' '), tags, dueDate }
}

export function serializeNote(note: StructuredNote, opts: SerializeOptions = {}): string {
  const tagsJoined = note.tags.join(opts.tagDelimiter ?? ' ')
  const marker = note.dueDate ? `${DUE_MARKER}${note.dueDate}]` : ''
  return `${note.body} ${tagsJoined} ${marker}`.trim()
}

/** Comma-join tags for the `tags` column. No tags → NULL. */
export function joinTags(tags: readonly string[]): string | null {
  return tags.length > 0 ? tags.join(PERSISTED_TAG_DELIMITER) : null
}

export function splitTags(joined: string | null | undefined): string[] {
  return joined ? joined.split(PERSISTED_TAG_DELIMITER) : []
}

/** Turn user-entered `todo, idea` into `['#todo', '#idea']`. */
export function parseTagList(input: string): string[] {
  return input
    .split(',')
    .map((t) => t.trim())
    .filter((t) => t.length > 0)
    .map((t) => `#${t}`)
}

export function recordToStructuredNote(record: NoteRecord): StructuredNote {
  return {
    body: record.body,
    tags: splitTags(record.tags),
    dueDate: record.dueDate,
  }
}
