/**
 * SQLite database client using Drizzle ORM over better-sqlite3
 */
import Database from 'better-sqlite3'
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import { PersistenceUnavailableError, errorMessage } from '../errors'
import * as schema from './schema'

const CREATE_PLAYERS_TABLE = `
  CREATE TABLE IF NOT EXISTS players (
    player_name TEXT PRIMARY KEY,
    value REAL NOT NULL,
    last_updated INTEGER NOT NULL
  )
`

export type ValuesDatabase = BetterSQLite3Database<typeof schema>

export interface DatabaseHandle {
  db: ValuesDatabase
  close(): void
}

/**
 * Open (creating if needed) the value cache database. Pass ":memory:" for an
 * in-process database.
 */
export function openValuesDatabase(path: string): DatabaseHandle {
  let sqlite: Database.Database
  try {
    sqlite = new Database(path)
    sqlite.pragma('journal_mode = WAL')
    sqlite.exec(CREATE_PLAYERS_TABLE)
  } catch (error) {
    throw new PersistenceUnavailableError(`Cannot open value database at ${path}: ${errorMessage(error)}`, {
      cause: error,
    })
  }

  const db = drizzle(sqlite, {
    schema,
    logger: process.env.DRIZZLE_LOG === 'true',
  })

  return {
    db,
    close: () => {
      if (sqlite.open) sqlite.close()
    },
  }
}
