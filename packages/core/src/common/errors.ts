/**
 * Typed error class for Jotline operations.
 */

export type ErrorCode =
  | 'DB_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'IO_ERROR'
  | 'PARSE_ERROR'
  | 'AUTH_ERROR'

export class JotlineError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'JotlineError'
    this.code = code
  }

  static notFound(entity: string, id: string | number): JotlineError {
    return new JotlineError('NOT_FOUND', `${entity} not found: ${id}`)
  }

  static validation(message: string): JotlineError {
    return new JotlineError('VALIDATION_ERROR', message)
  }

  static db(message: string): JotlineError {
    return new JotlineError('DB_ERROR', message)
  }

  static io(message: string): JotlineError {
    return new JotlineError('IO_ERROR', message)
  }

  static parse(message: string): JotlineError {
    return new JotlineError('PARSE_ERROR', message)
  }

  static auth(message: string): JotlineError {
    return new JotlineError('AUTH_ERROR', message)
  }
}

/** Message text from anything thrown. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

/** ENOENT from node:fs. */
export function isMissingFileError(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT'
}
