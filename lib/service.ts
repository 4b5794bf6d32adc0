import type { TradeWatchConfig } from './config'
import { openValuesDatabase, type DatabaseHandle } from './db/client'
import { NameResolver } from './name-resolver'
import { DynastyProcessCsvSource, type PlayerValueSource } from './player-values-csv'
import { RosterDirectory } from './roster-directory'
import { SleeperLeagueFeed, type LeagueFeed } from './sleeper/league-feed'
import { TaskScheduler, type TaskSchedulerOptions } from './task-scheduler'
import { TradeDesk } from './trade-desk'
import { ConsoleAnnouncer, DiscordWebhookAnnouncer } from './trade-watcher/announcer'
import { TradeWatcher } from './trade-watcher/trade-watcher'
import type { TradeAnnouncer } from './trade-watcher/types'
import { ValueIngestor } from './value-ingestor'
import { SqliteValueStore, type ValueStore } from './value-store'
import { PlayerValueTable } from './value-table'
import { WeekClock } from './week-clock'

export const TASK_TRADE_POLL = 'Trade Poll'
export const TASK_VALUE_REFRESH = 'Player Value Refresh'
export const TASK_WEEK_RECOMPUTE = 'Week Recompute'

export interface TradeWatchServiceDeps {
  feed?: LeagueFeed
  announcer?: TradeAnnouncer
  valueSource?: PlayerValueSource
  /** Replaces the SQLite store; no database is opened when given. */
  store?: ValueStore
  scheduler?: TaskSchedulerOptions
  now?: () => Date
}

export interface TradeWatchService {
  readonly desk: TradeDesk
  readonly watcher: TradeWatcher
  readonly clock: WeekClock
  readonly table: PlayerValueTable
  readonly scheduler: TaskScheduler
  start(): Promise<void>
  stop(): Promise<void>
}

export function createAnnouncer(config: TradeWatchConfig): TradeAnnouncer {
  if (config.discordWebhookUrl) {
    return new DiscordWebhookAnnouncer({ webhookUrl: config.discordWebhookUrl, timeoutMs: config.httpTimeoutMs })
  }
  console.log('[TradeWatch] No DISCORD_WEBHOOK_URL set, trades will be logged to the console')
  return new ConsoleAnnouncer()
}

/**
 * Wire every component from config. Collaborators passed in `deps` replace
 * the network and storage backed defaults.
 */
export function createTradeWatchService(config: TradeWatchConfig, deps: TradeWatchServiceDeps = {}): TradeWatchService {
  const now = deps.now ?? (() => new Date())

  let database: DatabaseHandle | null = null
  let store: ValueStore
  if (deps.store) {
    store = deps.store
  } else {
    database = openValuesDatabase(config.valuesDbPath)
    store = new SqliteValueStore(database.db, now)
  }

  const feed =
    deps.feed ??
    new SleeperLeagueFeed({
      leagueId: config.leagueId,
      timeoutMs: config.httpTimeoutMs,
      playerDirectoryTtlMs: config.playerDirectoryTtlMs,
    })
  const valueSource =
    deps.valueSource ??
    new DynastyProcessCsvSource({
      url: config.valuesCsvUrl,
      column: config.valuesColumn,
      timeoutMs: config.httpTimeoutMs,
    })

  const table = new PlayerValueTable()
  const resolver = new NameResolver(table, config.manualOverrides, { cutoff: config.fuzzyMatchCutoff, store })
  const ingestor = new ValueIngestor(valueSource, table, store, now)
  const clock = new WeekClock(config.week2Start, now())
  const rosters = new RosterDirectory()
  const watcher = new TradeWatcher({
    feed,
    resolver,
    rosters,
    announcer: deps.announcer ?? createAnnouncer(config),
    clock,
    fairnessThreshold: config.fairnessThreshold,
    now,
  })
  const scheduler = new TaskScheduler(deps.scheduler)
  const desk = new TradeDesk({ ingestor, clock, watcher, table, resolver, store, feed, rosters })

  scheduler.register({
    name: TASK_TRADE_POLL,
    intervalMs: config.intervals.tradePollMs,
    runOnStart: true,
    run: async () => {
      const report = await watcher.pollOnce()
      if (report.status === 'aborted') throw new Error(report.error ?? 'trade poll aborted')
    },
  })
  scheduler.register({
    name: TASK_VALUE_REFRESH,
    intervalMs: config.intervals.valueRefreshMs,
    runOnStart: true,
    run: async () => {
      if (ingestor.running) {
        console.log('[TradeWatch] Manual value refresh in progress, scheduled refresh deferred')
        return
      }
      const result = await ingestor.refresh()
      if (result.status === 'skipped') throw new Error(result.reason)
      if (result.status === 'failed') throw new Error(result.error)
    },
  })
  scheduler.register({
    name: TASK_WEEK_RECOMPUTE,
    intervalMs: config.intervals.weekRecomputeMs,
    run: async () => clock.recompute(now()),
  })

  return {
    desk,
    watcher,
    clock,
    table,
    scheduler,

    async start() {
      console.log(`[TradeWatch] Starting for league ${config.leagueId}`)
      await ingestor.seedFromStore()
      await rosters.load(feed)
      clock.recompute(now())
      scheduler.start()
    },

    async stop() {
      await scheduler.stop()
      database?.close()
      console.log('[TradeWatch] Stopped')
    },
  }
}
