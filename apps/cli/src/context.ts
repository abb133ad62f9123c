import fs from 'node:fs'
import type Database from 'better-sqlite3'
import { CredentialStore, NoteRepository, openDatabase } from '@jotline/core'
import type { JotlineCliConfig } from './config.js'

/** Opens the database on first use and closes it when the command finishes. */
export class CliContext {
  private db: Database.Database | null = null

  constructor(readonly config: JotlineCliConfig) {}

  credentials(): CredentialStore {
    this.ensureDataDir()
    return new CredentialStore(this.config.credentialsPath)
  }

  notes(): NoteRepository {
    if (!this.db) {
      this.ensureDataDir()
      this.db = openDatabase(this.config.databasePath)
    }
    return new NoteRepository(this.db)
  }

  close(): void {
    if (this.db) {
      this.db.close()
      this.db = null
    }
  }

  private ensureDataDir(): void {
    fs.mkdirSync(this.config.dataDir, { recursive: true })
  }
}
