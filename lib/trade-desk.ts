import type { NameResolution, NameResolver } from './name-resolver'
import type { RosterDirectory } from './roster-directory'
import type { LeagueFeed } from './sleeper/league-feed'
import type { SleeperRoster, SleeperUser } from './sleeper-client'
import type { TradeWatcher } from './trade-watcher/trade-watcher'
import { isCompletedTrade, playersByRoster } from './trade-watcher/trade-watcher'
import type { PollCycleReport } from './trade-watcher/types'
import type { RefreshResult, ValueIngestor } from './value-ingestor'
import type { ValueRecord, ValueStore } from './value-store'
import type { PlayerValueTable } from './value-table'
import type { WeekClock } from './week-clock'

export interface TradeDeskDeps {
  ingestor: Pick<ValueIngestor, 'refresh'>
  clock: Pick<WeekClock, 'currentWeek' | 'override'>
  watcher: Pick<TradeWatcher, 'pollOnce'>
  table: Pick<PlayerValueTable, 'sourceLabel' | 'size' | 'updatedAt'>
  resolver: Pick<NameResolver, 'lookup'>
  store: Pick<ValueStore, 'listAll'>
  feed: LeagueFeed
  rosters: Pick<RosterDirectory, 'teamName'>
}

export interface DataSourceInfo {
  label: string
  players: number
  updatedAt: Date | null
}

export interface PlayerValueAnswer extends NameResolution {
  input: string
  /** The matched name differs from what was asked for. */
  suggested: boolean
}

export interface ComparedValue {
  label: string
  value: number
}

export type RosterLookup =
  | { status: 'user-not-found'; userName: string }
  | { status: 'no-roster'; userName: string }
  | { status: 'found'; teamName: string; players: string[] }

export interface PlayerTradeMatch {
  transactionId: string
  week: number
  teamA: string
  playersA: string[]
  teamB: string
  playersB: string[]
}

function findUser(users: SleeperUser[], userName: string): SleeperUser | undefined {
  const wanted = userName.trim().toLowerCase()
  return users.find(
    (u) => (u.display_name ?? '').toLowerCase() === wanted || (u.username ?? '').toLowerCase() === wanted
  )
}

function rosterTeamName(roster: SleeperRoster, user: SleeperUser): string {
  return (
    roster.metadata?.team_name ||
    roster.settings?.team_name ||
    user.display_name ||
    user.username ||
    user.user_id
  )
}

function assertWeek(week: number): void {
  if (!Number.isInteger(week) || week < 1) {
    throw new RangeError(`Week must be a positive integer, got ${week}`)
  }
}

/**
 * Manual operations on a running watcher: value lookups, week control,
 * on-demand trade checks and read-only league queries.
 */
export class TradeDesk {
  constructor(private readonly deps: TradeDeskDeps) {}

  refreshValues(): Promise<RefreshResult> {
    return this.deps.ingestor.refresh({ manual: true })
  }

  currentWeek(): number {
    return this.deps.clock.currentWeek()
  }

  forceWeek(week: number): number {
    this.deps.clock.override(week)
    return this.deps.clock.currentWeek()
  }

  checkWeek(week: number): Promise<PollCycleReport> {
    assertWeek(week)
    console.log(`[TradeDesk] Manually checking trades for week ${week}`)
    return this.deps.watcher.pollOnce(week)
  }

  dataSource(): DataSourceInfo {
    const { table } = this.deps
    return { label: table.sourceLabel, players: table.size, updatedAt: table.updatedAt }
  }

  async playerValue(name: string): Promise<PlayerValueAnswer> {
    const input = name.trim()
    const resolution = await this.deps.resolver.lookup(input)
    const suggested =
      resolution.canonicalName !== null && resolution.canonicalName.toLowerCase() !== input.toLowerCase()
    return { ...resolution, input, suggested }
  }

  async compareValues(names: string[]): Promise<ComparedValue[]> {
    const out: ComparedValue[] = []
    for (const name of names.map((n) => n.trim()).filter(Boolean)) {
      const { value, canonicalName } = await this.deps.resolver.lookup(name)
      out.push({ label: canonicalName ?? name, value })
    }
    return out
  }

  storedPlayers(): Promise<ValueRecord[]> {
    return this.deps.store.listAll()
  }

  async rosterFor(userName: string): Promise<RosterLookup> {
    const { feed } = this.deps
    const [users, rosters, playerNames] = await Promise.all([
      feed.getUsers(),
      feed.getRosters(),
      feed.getPlayerNames(),
    ])

    const user = findUser(users, userName)
    if (!user) return { status: 'user-not-found', userName }

    const roster = rosters.find((r) => r.owner_id === user.user_id)
    if (!roster) return { status: 'no-roster', userName }

    const players = (roster.players ?? []).map((id) => playerNames.get(id) ?? `Unknown Player (${id})`)
    return { status: 'found', teamName: rosterTeamName(roster, user), players }
  }

  /**
   * Completed trades in `week` where a received player's name contains
   * `playerName`. Read-only: nothing is announced or marked as seen.
   */
  async playerTrades(playerName: string, week?: number): Promise<PlayerTradeMatch[]> {
    const targetWeek = week ?? this.deps.clock.currentWeek()
    assertWeek(targetWeek)
    const query = playerName.trim().toLowerCase()
    const [transactions, playerNames] = await Promise.all([
      this.deps.feed.getTransactions(targetWeek),
      this.deps.feed.getPlayerNames(),
    ])

    const matches: PlayerTradeMatch[] = []
    for (const txn of transactions) {
      if (!isCompletedTrade(txn) || txn.roster_ids.length < 2) continue

      const [rosterA, rosterB] = txn.roster_ids
      const received = playersByRoster(txn.adds)
      const playersA = (received.get(rosterA) ?? []).map((id) => playerNames.get(id) ?? id)
      const playersB = (received.get(rosterB) ?? []).map((id) => playerNames.get(id) ?? id)

      if (![...playersA, ...playersB].some((name) => name.toLowerCase().includes(query))) continue
      matches.push({
        transactionId: txn.transaction_id,
        week: targetWeek,
        teamA: this.deps.rosters.teamName(rosterA),
        playersA,
        teamB: this.deps.rosters.teamName(rosterB),
        playersB,
      })
    }
    return matches
  }
}
