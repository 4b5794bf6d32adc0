import fs from 'fs'
import { z } from 'zod'
import { buildOverrideTable, parseManualOverrides, type ManualOverrideTable } from './manual-overrides'

export const DEFAULT_VALUES_CSV_URL =
  'https://raw.githubusercontent.com/dynastyprocess/data/refs/heads/master/files/values-players.csv'

const DAY_MS = 24 * 60 * 60 * 1000

export type ValueColumn = 'value_1qb' | 'value_2qb'

export interface TradeWatchConfig {
  leagueId: string
  discordWebhookUrl: string | null
  valuesDbPath: string
  valuesCsvUrl: string
  valuesColumn: ValueColumn
  week2Start: Date
  fairnessThreshold: number
  fuzzyMatchCutoff: number
  intervals: {
    tradePollMs: number
    valueRefreshMs: number
    weekRecomputeMs: number
  }
  httpTimeoutMs: number
  playerDirectoryTtlMs: number
  manualOverrides: ManualOverrideTable
}

// Unset and empty env vars are treated the same
function envVar<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), schema)
}

const envSchema = z.object({
  SLEEPER_LEAGUE_ID: envVar(z.string({ required_error: 'is required' }).trim()),
  DISCORD_WEBHOOK_URL: envVar(z.string().url().optional()),
  VALUES_DB_PATH: envVar(z.string().default('./player-values.db')),
  VALUES_CSV_URL: envVar(z.string().url().default(DEFAULT_VALUES_CSV_URL)),
  VALUES_COLUMN: envVar(z.enum(['value_1qb', 'value_2qb']).default('value_1qb')),
  SEASON_WEEK2_START: envVar(z.string().datetime({ offset: true }).optional()),
  WEEK2_START_OFFSET_DAYS: envVar(z.coerce.number().int().min(0).default(2)),
  FAIRNESS_THRESHOLD: envVar(z.coerce.number().nonnegative().default(200)),
  FUZZY_MATCH_CUTOFF: envVar(z.coerce.number().min(0).max(1).default(0.5)),
  TRADE_POLL_INTERVAL_MS: envVar(z.coerce.number().int().positive().default(30_000)),
  VALUE_REFRESH_INTERVAL_MS: envVar(z.coerce.number().int().positive().default(DAY_MS)),
  WEEK_RECOMPUTE_INTERVAL_MS: envVar(z.coerce.number().int().positive().default(DAY_MS)),
  HTTP_TIMEOUT_MS: envVar(z.coerce.number().int().positive().default(10_000)),
  PLAYER_DIRECTORY_TTL_MS: envVar(z.coerce.number().int().nonnegative().default(6 * 60 * 60 * 1000)),
  MANUAL_OVERRIDES_PATH: envVar(z.string().optional()),
})

/**
 * Week 2 begins at UTC midnight of the startup day plus `offsetDays`.
 */
export function defaultWeek2Start(now: Date, offsetDays: number): Date {
  const midnight = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate())
  return new Date(midnight + offsetDays * DAY_MS)
}

/**
 * Load configuration from environment variables.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  now: Date = new Date()
): TradeWatchConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')} ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${issues}`)
  }
  const e = result.data

  let extraOverrides: Record<string, string> = {}
  if (e.MANUAL_OVERRIDES_PATH) {
    const json = fs.readFileSync(e.MANUAL_OVERRIDES_PATH, 'utf-8')
    extraOverrides = parseManualOverrides(json)
  }

  return Object.freeze({
    leagueId: e.SLEEPER_LEAGUE_ID,
    discordWebhookUrl: e.DISCORD_WEBHOOK_URL ?? null,
    valuesDbPath: e.VALUES_DB_PATH,
    valuesCsvUrl: e.VALUES_CSV_URL,
    valuesColumn: e.VALUES_COLUMN,
    week2Start: e.SEASON_WEEK2_START
      ? new Date(e.SEASON_WEEK2_START)
      : defaultWeek2Start(now, e.WEEK2_START_OFFSET_DAYS),
    fairnessThreshold: e.FAIRNESS_THRESHOLD,
    fuzzyMatchCutoff: e.FUZZY_MATCH_CUTOFF,
    intervals: Object.freeze({
      tradePollMs: e.TRADE_POLL_INTERVAL_MS,
      valueRefreshMs: e.VALUE_REFRESH_INTERVAL_MS,
      weekRecomputeMs: e.WEEK_RECOMPUTE_INTERVAL_MS,
    }),
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    playerDirectoryTtlMs: e.PLAYER_DIRECTORY_TTL_MS,
    manualOverrides: buildOverrideTable(extraOverrides),
  })
}
