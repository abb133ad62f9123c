/**
 * Result type for operations that fail in expected ways
 * (duplicate keys, missing rows, unreadable import files).
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}

/** Return the value, or throw the error (wrapping non-Error values). */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value
  if (result.error instanceof Error) throw result.error
  throw new Error(String(result.error))
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok
}

export function mapOk<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? Ok(fn(result.value)) : result
}
