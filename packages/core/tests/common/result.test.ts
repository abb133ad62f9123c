import { describe, it, expect } from 'vitest'
import { Ok, Err, unwrap, isOk, isErr, mapOk, JotlineError } from '../../src/common/index.js'

describe('Result', () => {
  it('Ok wraps a value', () => {
    const result = Ok(7)
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value).toBe(7)
  })

  it('Err wraps a JotlineError', () => {
    const result = Err(JotlineError.notFound('Note', 3))
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('NOT_FOUND')
      expect(result.error.message).toBe('Note not found: 3')
    }
  })

  it('unwrap returns the value for Ok', () => {
    expect(unwrap(Ok('saved'))).toBe('saved')
  })

  it('unwrap rethrows an Error', () => {
    expect(() => unwrap(Err(JotlineError.parse('Invalid JSON format')))).toThrow('Invalid JSON format')
  })

  it('unwrap wraps a non-Error value', () => {
    expect(() => unwrap(Err('plain failure'))).toThrow('plain failure')
  })

  it('isOk / isErr narrow', () => {
    expect(isOk(Ok(1))).toBe(true)
    expect(isErr(Ok(1))).toBe(false)
    expect(isErr(Err('x'))).toBe(true)
    expect(isOk(Err('x'))).toBe(false)
  })

  it('mapOk transforms values and passes errors through', () => {
    expect(mapOk(Ok(2), (n) => n * 3)).toEqual({ ok: true, value: 6 })
    const failed = mapOk(Err(JotlineError.db('locked')), (n: number) => n + 1)
    expect(failed.ok).toBe(false)
  })
})

describe('JotlineError', () => {
  it('carries code and name', () => {
    const err = JotlineError.auth('Login failed')
    expect(err).toBeInstanceOf(Error)
    expect(err.name).toBe('JotlineError')
    expect(err.code).toBe('AUTH_ERROR')
  })
})
