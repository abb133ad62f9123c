/**
 * @jotline/core
 *
 * Framework-agnostic core library for Jotline.
 * Provides the note text codec, due-date views, storage, credentials, and import/export.
 */

export * from './common/index.js'
export * from './notes/index.js'
export * from './storage/index.js'
export * from './auth/index.js'
export * from './transfer/index.js'
