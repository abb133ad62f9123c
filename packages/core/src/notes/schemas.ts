/**
 * Note shapes and Zod schemas.
 */

import { z } from 'zod'

/** Longest note body accepted from interactive entry. */
export const MAX_NOTE_LENGTH = 500

/** Parsed form of a note: free text with tag tokens and the due marker pulled out. */
export interface StructuredNote {
  body: string
  /** Raw `#`-prefixed tokens in order of appearance; duplicates kept. */
  tags: string[]
  /** Text of the last `[due:...]` marker. Not validated as a calendar date. */
  dueDate: string | null
}

/** A persisted note row. `tags` is the comma-joined tag string. */
export interface NoteRecord {
  id: number
  user: string
  body: string
  tags: string | null
  dueDate: string | null
}

/** Explicit session context passed to every user-scoped operation. */
export interface Session {
  user: string
}

// ── Due-date views ──

export const DueModeSchema = z.enum(['today', 'overdue', 'week'])
export type DueMode = z.infer<typeof DueModeSchema>

// ── Interactive input ──

export const CreateNoteInputSchema = z.object({
  text: z
    .string()
    .trim()
    .min(1, "Note can't be empty")
    .max(MAX_NOTE_LENGTH, `Note too long (max ${MAX_NOTE_LENGTH} characters)`),
  tags: z.string().default(''),
  dueDate: z.string().trim().default(''),
})

export type CreateNoteInput = z.input<typeof CreateNoteInputSchema>

export const EditNoteInputSchema = z.object({
  text: z.string().trim().max(MAX_NOTE_LENGTH, `Note too long (max ${MAX_NOTE_LENGTH} characters)`).default(''),
  tags: z.string().default(''),
  dueDate: z.string().trim().default(''),
})

export type EditNoteInput = z.input<typeof EditNoteInputSchema>
