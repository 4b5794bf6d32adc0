import { errorMessage } from './errors'
import type { LeagueFeed } from './sleeper/league-feed'
import type { SleeperUser } from './sleeper-client'

export function fallbackTeamName(rosterId: number): string {
  return `Team ${rosterId}`
}

function userTeamName(user: SleeperUser | undefined): string | null {
  return user?.metadata?.team_name || user?.display_name || null
}

/**
 * Roster id -> team display name, built from league users and rosters.
 * Unknown rosters read as "Team <id>".
 */
export class RosterDirectory {
  private teams = new Map<number, string>()

  async load(feed: Pick<LeagueFeed, 'getUsers' | 'getRosters'>): Promise<boolean> {
    try {
      const [users, rosters] = await Promise.all([feed.getUsers(), feed.getRosters()])
      const usersById = new Map(users.map((u) => [u.user_id, u]))

      const teams = new Map<number, string>()
      for (const roster of rosters) {
        const owner = roster.owner_id ? usersById.get(roster.owner_id) : undefined
        teams.set(roster.roster_id, userTeamName(owner) ?? fallbackTeamName(roster.roster_id))
      }

      this.teams = teams
      console.log(`[RosterDirectory] Loaded ${teams.size} rosters`)
      return true
    } catch (error) {
      console.error(`[RosterDirectory] Failed to load rosters, keeping ${this.teams.size} known: ${errorMessage(error)}`)
      return false
    }
  }

  teamName(rosterId: number): string {
    return this.teams.get(rosterId) ?? fallbackTeamName(rosterId)
  }

  get size(): number {
    return this.teams.size
  }
}
