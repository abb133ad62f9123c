/**
 * Import/export — legacy text files and JSON exports.
 */

export { JsonNoteSchema, JsonExportSchema } from './schemas.js'
export type { JsonNote, ImportSummary } from './schemas.js'

export { importLegacyText, importLegacyTextFile } from './legacy-text.js'

export {
  buildNoteFromJson,
  parseJsonExport,
  importJsonExport,
  importJsonExportFile,
  exportNotesToJson,
  exportNotesToJsonFile,
} from './json.js'
