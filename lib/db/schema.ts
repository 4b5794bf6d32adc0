/**
 * Drizzle schema for the player value cache
 */
import { integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core'

export const players = sqliteTable('players', {
  playerName: text('player_name').primaryKey(),
  value: real('value').notNull(),
  lastUpdated: integer('last_updated', { mode: 'timestamp_ms' }).notNull(),
})
