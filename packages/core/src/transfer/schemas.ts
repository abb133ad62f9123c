/**
 * Zod schemas for the JSON export format.
 */

import { z } from 'zod'

/**
 * One exported note. Tags are the raw tokens as captured, `#` included.
 * Missing fields take the same defaults the importer has always used.
 */
export const JsonNoteSchema = z.object({
  note: z.string().default(''),
  tags: z.array(z.string()).default([]),
  due_date: z.string().nullable().default(null),
})

export type JsonNote = z.infer<typeof JsonNoteSchema>

export const JsonExportSchema = z.array(JsonNoteSchema)

export interface ImportSummary {
  /** Notes inserted. */
  imported: number
  /** Exact duplicates that were already stored. */
  skipped: number
}
