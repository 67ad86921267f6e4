import Database from 'better-sqlite3'
import { getDatabasePath, initializeStorage } from '../storage/paths'
import { runMigrations } from './migrations/001-initial-schema'

let db: Database.Database | null = null

export function getDatabase(): Database.Database {
  if (!db) {
    initializeStorage()
    db = new Database(getDatabasePath())
    db.pragma('journal_mode = WAL')
    runMigrations(db)
  }
  return db
}

export function closeDatabase(): void {
  if (db) {
    db.close()
    db = null
  }
}
