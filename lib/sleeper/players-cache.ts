import { getAllPlayers, getPlayerName, type SleeperPlayer } from '../sleeper-client'
import { errorMessage } from '../errors'

// The directory is a multi-megabyte payload; give it more room than regular calls
const MIN_DIRECTORY_TIMEOUT_MS = 15_000

type FetchPlayers = (timeoutMs: number) => Promise<Record<string, SleeperPlayer>>

export interface PlayerDirectoryOptions {
  ttlMs: number
  timeoutMs: number
  fetchPlayers?: FetchPlayers
  now?: () => number
}

/**
 * Player id -> display name, cached for `ttlMs`. A failed refresh serves the
 * previous copy when there is one and rethrows otherwise.
 */
export class PlayerDirectory {
  private names: Map<string, string> | null = null
  private cacheTs = 0
  private readonly fetchPlayers: FetchPlayers
  private readonly now: () => number

  constructor(private readonly opts: PlayerDirectoryOptions) {
    this.fetchPlayers = opts.fetchPlayers ?? ((timeoutMs) => getAllPlayers({ timeoutMs }))
    this.now = opts.now ?? (() => Date.now())
  }

  async getNames(): Promise<Map<string, string>> {
    const now = this.now()
    if (this.names && now - this.cacheTs < this.opts.ttlMs) return this.names

    try {
      const players = await this.fetchPlayers(Math.max(this.opts.timeoutMs, MIN_DIRECTORY_TIMEOUT_MS))
      const names = new Map<string, string>()
      for (const id of Object.keys(players)) {
        names.set(id, getPlayerName(players, id))
      }
      this.names = names
      this.cacheTs = now
      console.log(`[PlayerDirectory] Loaded ${names.size} players`)
      return names
    } catch (error) {
      if (!this.names) throw error
      console.warn(`[PlayerDirectory] Refresh failed, serving cached copy: ${errorMessage(error)}`)
      return this.names
    }
  }

  get size(): number {
    return this.names?.size ?? 0
  }
}
