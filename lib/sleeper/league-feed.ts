import {
  getLeagueRosters,
  getLeagueTransactions,
  getLeagueUsers,
  type SleeperRoster,
  type SleeperTransaction,
  type SleeperUser,
} from '../sleeper-client'
import { PlayerDirectory } from './players-cache'

/** Everything the watcher and control surface read from the league. */
export interface LeagueFeed {
  getTransactions(week: number): Promise<SleeperTransaction[]>
  getPlayerNames(): Promise<Map<string, string>>
  getUsers(): Promise<SleeperUser[]>
  getRosters(): Promise<SleeperRoster[]>
}

export interface SleeperLeagueFeedOptions {
  leagueId: string
  timeoutMs: number
  playerDirectoryTtlMs: number
}

export class SleeperLeagueFeed implements LeagueFeed {
  private readonly directory: PlayerDirectory

  constructor(private readonly opts: SleeperLeagueFeedOptions, directory?: PlayerDirectory) {
    this.directory =
      directory ?? new PlayerDirectory({ ttlMs: opts.playerDirectoryTtlMs, timeoutMs: opts.timeoutMs })
  }

  getTransactions(week: number): Promise<SleeperTransaction[]> {
    return getLeagueTransactions(this.opts.leagueId, week, { timeoutMs: this.opts.timeoutMs })
  }

  getPlayerNames(): Promise<Map<string, string>> {
    return this.directory.getNames()
  }

  getUsers(): Promise<SleeperUser[]> {
    return getLeagueUsers(this.opts.leagueId, { timeoutMs: this.opts.timeoutMs })
  }

  getRosters(): Promise<SleeperRoster[]> {
    return getLeagueRosters(this.opts.leagueId, { timeoutMs: this.opts.timeoutMs })
  }
}
