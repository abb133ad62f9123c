/**
 * Plain-text rendering for command output.
 */

import type { DueAlertSummary, NoteRecord } from '@jotline/core'

const HEADERS = ['ID', 'Note', 'Tags', 'Due Date'] as const

/** Fixed-width table, `-` for empty tags or due date. */
export function renderNotesTable(records: readonly NoteRecord[]): string[] {
  const rows = records.map((r) => [String(r.id), r.body, r.tags || '-', r.dueDate || '-'])
  const widths = HEADERS.map((h, col) => Math.max(h.length, ...rows.map((row) => row[col].length)))

  const line = (cells: readonly string[]) =>
    cells
      .map((cell, col) => cell.padEnd(widths[col]))
      .join(' | ')
      .trimEnd()

  return [line(HEADERS), widths.map((w) => '-'.repeat(w)).join('-+-'), ...rows.map(line)]
}

export function renderDueAlerts(summary: DueAlertSummary): string {
  if (summary.overdue === 0 && summary.dueToday === 0) {
    return 'No due tasks today. All clear'
  }
  return `Reminders: ${summary.overdue} overdue | ${summary.dueToday} due today`
}
