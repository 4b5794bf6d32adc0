export { loadConfig, defaultWeek2Start, DEFAULT_VALUES_CSV_URL, type TradeWatchConfig, type ValueColumn } from './config'
export {
  MalformedDataError,
  PersistenceUnavailableError,
  TransientFetchError,
  errorMessage,
  type DataSource,
} from './errors'
export { DEFAULT_MANUAL_OVERRIDES, buildOverrideTable, parseManualOverrides, type ManualOverrideTable } from './manual-overrides'
export { findClosestMatch, similarityRatio, type ClosestMatch } from './name-matching'
export { NameResolver, DEFAULT_FUZZY_CUTOFF, type NameResolution, type ResolutionMethod } from './name-resolver'
export { DynastyProcessCsvSource, parsePlayerValuesCSV, type PlayerValueSource } from './player-values-csv'
export { RosterDirectory } from './roster-directory'
export { SleeperLeagueFeed, type LeagueFeed } from './sleeper/league-feed'
export { PlayerDirectory } from './sleeper/players-cache'
export { TaskScheduler, type PeriodicTask, type TaskRunOutcome, type TaskStatus } from './task-scheduler'
export { TradeDesk } from './trade-desk'
export {
  ConsoleAnnouncer,
  DiscordWebhookAnnouncer,
  buildTradeEmbed,
  describeVerdict,
  formatTradeText,
} from './trade-watcher/announcer'
export { judgeTrade, DEFAULT_FAIRNESS_THRESHOLD } from './trade-watcher/fairness'
export { KnownTradeSet } from './trade-watcher/known-trades'
export { TradeWatcher } from './trade-watcher/trade-watcher'
export type {
  AnnounceResult,
  PollCycleReport,
  TradeAnnouncer,
  TradeAsset,
  TradeEvent,
  TradeSide,
  TradeVerdict,
} from './trade-watcher/types'
export { ValueIngestor, type RefreshResult } from './value-ingestor'
export { SqliteValueStore, type ValueRecord, type ValueStore } from './value-store'
export { openValuesDatabase } from './db/client'
export { PlayerValueTable } from './value-table'
export { WeekClock } from './week-clock'
export { createTradeWatchService, type TradeWatchService, type TradeWatchServiceDeps } from './service'
