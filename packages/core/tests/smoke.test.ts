import { describe, it, expect } from 'vitest'

describe('@jotline/core', () => {
  it('exposes the codec, classifier and repository', async () => {
    const core = await import('../src/index.js')
    expect(typeof core.parseNote).toBe('function')
    expect(typeof core.classifyDueNotes).toBe('function')
    expect(typeof core.NoteRepository).toBe('function')
  })
})
