import { asc, sql } from 'drizzle-orm'
import type { ValuesDatabase } from './db/client'
import { players } from './db/schema'
import { PersistenceUnavailableError, errorMessage } from './errors'

export interface ValueRecord {
  playerName: string
  value: number
  lastUpdated: Date
}

/**
 * Persistent name -> value cache. Writes are durable when the promise
 * resolves; storage failures reject with PersistenceUnavailableError.
 */
export interface ValueStore {
  upsert(name: string, value: number): Promise<void>
  upsertMany(entries: Iterable<readonly [string, number]>): Promise<number>
  loadAll(): Promise<Map<string, number>>
  findLike(pattern: string): Promise<string[]>
  listAll(): Promise<ValueRecord[]>
}

/** Escape LIKE wildcards so the pattern matches as a literal substring. */
function escapeLike(pattern: string): string {
  return pattern.replace(/[\\%_]/g, '\\$&')
}

export class SqliteValueStore implements ValueStore {
  constructor(
    private readonly db: ValuesDatabase,
    private readonly now: () => Date = () => new Date()
  ) {}

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn()
    } catch (error) {
      throw new PersistenceUnavailableError(`Value store ${operation} failed: ${errorMessage(error)}`, {
        cause: error,
      })
    }
  }

  async upsert(name: string, value: number): Promise<void> {
    await this.upsertMany([[name, value]])
  }

  async upsertMany(entries: Iterable<readonly [string, number]>): Promise<number> {
    const lastUpdated = this.now()
    return this.guard('upsert', () =>
      this.db.transaction((tx) => {
        let written = 0
        for (const [playerName, value] of entries) {
          tx.insert(players)
            .values({ playerName, value, lastUpdated })
            .onConflictDoUpdate({
              target: players.playerName,
              // never move a record's timestamp backwards
              set: { value, lastUpdated: sql`max(last_updated, excluded.last_updated)` },
            })
            .run()
          written++
        }
        return written
      })
    )
  }

  async loadAll(): Promise<Map<string, number>> {
    const rows = this.guard('loadAll', () =>
      this.db.select({ playerName: players.playerName, value: players.value }).from(players).all()
    )
    return new Map(rows.map((row) => [row.playerName, row.value]))
  }

  async findLike(pattern: string): Promise<string[]> {
    const rows = this.guard('findLike', () =>
      this.db
        .select({ playerName: players.playerName })
        .from(players)
        .where(sql`${players.playerName} LIKE ${`%${escapeLike(pattern)}%`} ESCAPE '\\'`)
        .orderBy(asc(players.playerName))
        .all()
    )
    return rows.map((row) => row.playerName)
  }

  async listAll(): Promise<ValueRecord[]> {
    return this.guard('listAll', () =>
      this.db.select().from(players).orderBy(asc(players.playerName)).all()
    )
  }
}
