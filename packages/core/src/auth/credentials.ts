/**
 * Flat-file credential store: one `username:sha256hex` line per user.
 */

import { createHash } from 'node:crypto'
import { appendFile, readFile } from 'node:fs/promises'
import { Ok, Err, JotlineError, errorMessage, isMissingFileError, UsernameSchema } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { Session } from '../notes/index.js'

export function hashPassword(password: string): string {
  return createHash('sha256').update(password, 'utf8').digest('hex')
}

interface CredentialLine {
  username: string
  hash: string
}

function parseCredentialLine(line: string): CredentialLine | null {
  const parts = line.trim().split(':')
  if (parts.length !== 2 || !parts[0] || !parts[1]) return null
  return { username: parts[0], hash: parts[1] }
}

export class CredentialStore {
  constructor(private filePath: string) {}

  /** Create a user. Fails when the name is taken or either field is blank. */
  async register(username: string, password: string): Promise<Result<Session, JotlineError>> {
    const name = UsernameSchema.safeParse(username)
    if (!name.success) {
      return Err(JotlineError.validation(name.error.issues.map((i) => i.message).join('; ')))
    }
    const pw = password.trim()
    if (!pw) return Err(JotlineError.validation('Password cannot be empty'))

    const existing = await this.readAll()
    if (!existing.ok) return existing
    if (existing.value.some((c) => c.username === name.data)) {
      return Err(JotlineError.validation('Username already exists.'))
    }

    try {
      await appendFile(this.filePath, `${name.data}:${hashPassword(pw)}\n`, 'utf8')
    } catch (e) {
      return Err(JotlineError.io(errorMessage(e)))
    }
    return Ok({ user: name.data })
  }

  async login(username: string, password: string): Promise<Result<Session, JotlineError>> {
    const name = username.trim()
    const hash = hashPassword(password.trim())

    const existing = await this.readAll()
    if (!existing.ok) return existing
    const match = existing.value.find((c) => c.username === name && c.hash === hash)
    if (!match) return Err(JotlineError.auth('Login failed. Try again'))
    return Ok({ user: match.username })
  }

  /** Missing file → no users. Malformed lines are skipped. */
  private async readAll(): Promise<Result<CredentialLine[], JotlineError>> {
    let content: string
    try {
      content = await readFile(this.filePath, 'utf8')
    } catch (e) {
      if (isMissingFileError(e)) return Ok([])
      return Err(JotlineError.io(errorMessage(e)))
    }

    const lines: CredentialLine[] = []
    for (const raw of content.split('\n')) {
      const parsed = parseCredentialLine(raw)
      if (parsed) lines.push(parsed)
    }
    return Ok(lines)
  }
}
