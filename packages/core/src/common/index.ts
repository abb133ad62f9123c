/**
 * Common utilities — shared types, Result pattern, error handling.
 */

export { Ok, Err, unwrap, isOk, isErr, mapOk } from './result.js'
export type { Result } from './result.js'

export { JotlineError, errorMessage, isMissingFileError } from './errors.js'
export type { ErrorCode } from './errors.js'

export { UsernameSchema } from './schemas.js'
