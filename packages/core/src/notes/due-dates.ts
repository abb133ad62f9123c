/**
 * Pure due-date evaluation — no DB access.
 *
 * Dates are `YYYY-MM-DD` strings compared as UTC calendar days.
 */

import type { DueMode } from './schemas.js'

const DAY_MS = 86_400_000
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/

/** Window for the `week` view, inclusive of both ends. */
export const WEEK_WINDOW_DAYS = 7

/** UTC YYYY-MM-DD. Single source of truth for "today". */
export function todayISO(): string {
  return new Date().toISOString().slice(0, 10)
}

/**
 * Strict `YYYY-MM-DD` → UTC day number (days since epoch).
 * Returns null for anything else, including impossible dates like 2025-02-30.
 */
export function parseISODate(value: string): number | null {
  const m = ISO_DATE_RE.exec(value)
  if (!m) return null
  const year = Number(m[1])
  const month = Number(m[2])
  const day = Number(m[3])
  if (year < 1) return null
  const check = new Date(0)
  check.setUTCFullYear(year, month - 1, day)
  const ms = check.getTime()
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null
  }
  return Math.round(ms / DAY_MS)
}

export function isValidISODate(value: string): boolean {
  return parseISODate(value) !== null
}

export function matchesDueMode(dueDate: string | null | undefined, referenceDate: string, mode: DueMode): boolean {
  if (!dueDate) return false
  const due = parseISODate(dueDate)
  const ref = parseISODate(referenceDate)
  if (due === null || ref === null) return false

  switch (mode) {
    case 'today':
      return due === ref
    case 'overdue':
      return due < ref
    case 'week':
      return due >= ref && due <= ref + WEEK_WINDOW_DAYS
  }
}

/**
 * Notes matching a due-date view, input order preserved.
 * Notes without a due date, or with one that isn't a valid date, never match.
 */
export function classifyDueNotes<T extends { dueDate: string | null }>(
  notes: readonly T[],
  referenceDate: string,
  mode: DueMode,
): T[] {
  return notes.filter((n) => matchesDueMode(n.dueDate, referenceDate, mode))
}

export interface DueAlertSummary {
  overdue: number
  dueToday: number
}

/** Counts shown after login. Malformed dates are skipped. */
export function summarizeDueAlerts(
  notes: readonly { dueDate: string | null }[],
  referenceDate: string,
): DueAlertSummary {
  let overdue = 0
  let dueToday = 0
  for (const n of notes) {
    if (matchesDueMode(n.dueDate, referenceDate, 'overdue')) overdue++
    else if (matchesDueMode(n.dueDate, referenceDate, 'today')) dueToday++
  }
  return { overdue, dueToday }
}
