import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { defaultJsonExportPath, defaultLegacyTextPath, loadConfig } from '../src/config.js'

let cwd: string

beforeEach(() => {
  cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'jotline-config-'))
})

afterEach(() => {
  fs.rmSync(cwd, { recursive: true, force: true })
})

describe('loadConfig', () => {
  it('defaults to the working directory', () => {
    const config = loadConfig(cwd, {})
    expect(config).toEqual({
      dataDir: cwd,
      databasePath: path.join(cwd, 'jotline.db'),
      credentialsPath: path.join(cwd, 'users.txt'),
    })
  })

  it('uses JOTLINE_HOME and JOTLINE_DB from the environment', () => {
    const config = loadConfig(cwd, { JOTLINE_HOME: 'data', JOTLINE_DB: '/var/tmp/notes.db' })
    expect(config.dataDir).toBe(path.join(cwd, 'data'))
    expect(config.databasePath).toBe('/var/tmp/notes.db')
    expect(config.credentialsPath).toBe(path.join(cwd, 'data', 'users.txt'))
  })

  it('keeps an in-memory database path as is', () => {
    expect(loadConfig(cwd, { JOTLINE_DB: ':memory:' }).databasePath).toBe(':memory:')
  })

  it('reads a JSON config file', () => {
    fs.writeFileSync(
      path.join(cwd, 'jotline.config.json'),
      JSON.stringify({ dataDir: 'store', databaseFile: 'mine.db' }),
      'utf8',
    )
    const config = loadConfig(cwd, {})
    expect(config.dataDir).toBe(path.join(cwd, 'store'))
    expect(config.databasePath).toBe(path.join(cwd, 'store', 'mine.db'))
    expect(config.configFile).toBe(path.join(cwd, 'jotline.config.json'))
  })

  it('reads a YAML config file', () => {
    fs.writeFileSync(path.join(cwd, 'jotline.config.yaml'), 'credentialsFile: creds.txt\n', 'utf8')
    expect(loadConfig(cwd, {}).credentialsPath).toBe(path.join(cwd, 'creds.txt'))
  })

  it('prefers JOTLINE_HOME over the config file', () => {
    fs.writeFileSync(path.join(cwd, 'jotline.config.json'), JSON.stringify({ dataDir: 'store' }), 'utf8')
    expect(loadConfig(cwd, { JOTLINE_HOME: 'env-home' }).dataDir).toBe(path.join(cwd, 'env-home'))
  })

  it('rejects unknown keys', () => {
    fs.writeFileSync(path.join(cwd, 'jotline.config.json'), JSON.stringify({ dbFile: 'x.db' }), 'utf8')
    expect(() => loadConfig(cwd, {})).toThrow(/^Invalid config/)
  })

  it('rejects malformed JSON', () => {
    fs.writeFileSync(path.join(cwd, 'jotline.config.json'), '{', 'utf8')
    expect(() => loadConfig(cwd, {})).toThrow()
  })
})

describe('default transfer paths', () => {
  it('places per-user files in the data directory', () => {
    const config = loadConfig(cwd, {})
    expect(defaultLegacyTextPath(config, 'alice')).toBe(path.join(cwd, 'notes_alice.txt'))
    expect(defaultJsonExportPath(config, 'alice')).toBe(path.join(cwd, 'alice_notes_export.json'))
  })
})
