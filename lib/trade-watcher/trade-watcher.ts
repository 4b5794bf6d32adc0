import { MalformedDataError, errorMessage } from '../errors'
import type { NameResolver } from '../name-resolver'
import type { RosterDirectory } from '../roster-directory'
import type { LeagueFeed } from '../sleeper/league-feed'
import type { SleeperTransaction } from '../sleeper-client'
import type { WeekClock } from '../week-clock'
import { DEFAULT_FAIRNESS_THRESHOLD, judgeTrade } from './fairness'
import { KnownTradeSet } from './known-trades'
import type { PollCycleReport, TradeAnnouncer, TradeAsset, TradeEvent, TradeSide } from './types'

export interface TradeWatcherDeps {
  feed: Pick<LeagueFeed, 'getTransactions' | 'getPlayerNames'>
  resolver: Pick<NameResolver, 'lookup'>
  rosters: Pick<RosterDirectory, 'teamName'>
  announcer: TradeAnnouncer
  clock: Pick<WeekClock, 'currentWeek'>
  fairnessThreshold?: number
  now?: () => Date
}

export function isCompletedTrade(txn: SleeperTransaction): boolean {
  return txn.type === 'trade' && txn.status === 'complete'
}

/** Player ids grouped by the roster that received them, in feed order. */
export function playersByRoster(adds: Record<string, number>): Map<number, string[]> {
  const byRoster = new Map<number, string[]>()
  for (const [playerId, rosterId] of Object.entries(adds)) {
    const list = byRoster.get(rosterId)
    if (list) list.push(playerId)
    else byRoster.set(rosterId, [playerId])
  }
  return byRoster
}

/**
 * Polls the league's transactions for one week, announces each completed
 * trade not seen before, and remembers it once the announcement succeeds.
 * A trade whose announcement failed is picked up again on the next cycle.
 */
export class TradeWatcher {
  private readonly known = new KnownTradeSet()
  private readonly threshold: number
  private readonly now: () => Date
  private inFlight = false

  constructor(private readonly deps: TradeWatcherDeps) {
    this.threshold = deps.fairnessThreshold ?? DEFAULT_FAIRNESS_THRESHOLD
    this.now = deps.now ?? (() => new Date())
  }

  get running(): boolean {
    return this.inFlight
  }

  knownTradeIds(): string[] {
    return this.known.values()
  }

  /** Completed trades not yet announced, first occurrence of each id only. */
  filterNewTrades(transactions: SleeperTransaction[]): SleeperTransaction[] {
    const seen = new Set<string>()
    return transactions.filter((txn) => {
      if (!isCompletedTrade(txn)) return false
      if (this.known.has(txn.transaction_id) || seen.has(txn.transaction_id)) return false
      seen.add(txn.transaction_id)
      return true
    })
  }

  async pollOnce(weekOverride?: number): Promise<PollCycleReport> {
    const week = weekOverride ?? this.deps.clock.currentWeek()
    const report: PollCycleReport = { status: 'completed', week, fetched: 0, qualifying: 0, announced: 0, failed: 0 }

    if (this.inFlight) {
      console.log(`[TradeWatcher] Week ${week}: SKIPPED (previous cycle still running)`)
      return { ...report, status: 'skipped' }
    }

    this.inFlight = true
    try {
      let fetched: [SleeperTransaction[], Map<string, string>]
      try {
        fetched = await Promise.all([
          this.deps.feed.getTransactions(week),
          this.deps.feed.getPlayerNames(),
        ])
      } catch (error) {
        const message = errorMessage(error)
        console.error(`[TradeWatcher] Week ${week}: fetch failed, cycle aborted - ${message}`)
        return { ...report, status: 'aborted', error: message }
      }
      const [transactions, playerNames] = fetched

      report.fetched = transactions.length
      const fresh = this.filterNewTrades(transactions)
      report.qualifying = fresh.length
      console.log(`[TradeWatcher] Fetched ${transactions.length} transactions (Week ${week}), ${fresh.length} new trades`)

      for (const txn of fresh) {
        if (await this.processTrade(txn, week, playerNames)) report.announced++
        else report.failed++
      }
      return report
    } finally {
      this.inFlight = false
    }
  }

  private async processTrade(
    txn: SleeperTransaction,
    week: number,
    playerNames: Map<string, string>
  ): Promise<boolean> {
    const id = txn.transaction_id
    let event: TradeEvent
    try {
      event = await this.buildEvent(txn, week, playerNames)
    } catch (error) {
      console.warn(`[TradeWatcher] Skipping transaction ${id}: ${errorMessage(error)}`)
      return false
    }

    try {
      const result = await this.deps.announcer.announce(event)
      if (!result.ok) {
        console.error(`[TradeWatcher] Announcement failed for ${id}, will retry: ${result.error}`)
        return false
      }
    } catch (error) {
      console.error(`[TradeWatcher] Announcement failed for ${id}, will retry: ${errorMessage(error)}`)
      return false
    }

    this.known.add(id)
    console.log(`[TradeWatcher] Trade message sent for ${id}`)
    return true
  }

  async buildEvent(txn: SleeperTransaction, week: number, playerNames: Map<string, string>): Promise<TradeEvent> {
    const rosterIds = txn.roster_ids
    if (rosterIds.length < 2) {
      throw new MalformedDataError(`Not enough roster_ids in transaction ${txn.transaction_id}`, {
        source: 'sleeper',
      })
    }
    if (rosterIds.length > 2) {
      console.warn(
        `[TradeWatcher] Transaction ${txn.transaction_id} involves ${rosterIds.length} rosters; only the first two are valued`
      )
    }

    const received = playersByRoster(txn.adds)
    const sideA = await this.buildSide(rosterIds[0], received.get(rosterIds[0]) ?? [], playerNames)
    const sideB = await this.buildSide(rosterIds[1], received.get(rosterIds[1]) ?? [], playerNames)
    const valueA = sumValues(sideA.assets)
    const valueB = sumValues(sideB.assets)

    return {
      transactionId: txn.transaction_id,
      week,
      sideA,
      sideB,
      valueA,
      valueB,
      verdict: judgeTrade(valueA, valueB, this.threshold),
      detectedAt: this.now(),
    }
  }

  private async buildSide(rosterId: number, playerIds: string[], playerNames: Map<string, string>): Promise<TradeSide> {
    const assets: TradeAsset[] = []
    for (const playerId of playerIds) {
      const displayName = playerNames.get(playerId) ?? playerId
      const resolution = await this.deps.resolver.lookup(displayName)
      assets.push({ playerId, displayName, matchedName: resolution.canonicalName, value: resolution.value })
    }
    return {
      rosterId,
      team: this.deps.rosters.teamName(rosterId),
      assetNames: assets.map((a) => a.displayName),
      assets,
    }
  }
}

function sumValues(assets: TradeAsset[]): number {
  return assets.reduce((total, asset) => total + asset.value, 0)
}
