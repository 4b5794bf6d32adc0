import { z } from 'zod'
import { MalformedDataError, TransientFetchError, errorMessage } from './errors'

const SLEEPER_API_BASE = 'https://api.sleeper.app/v1'
const DEFAULT_TIMEOUT_MS = 10_000

const teamNameMetadataSchema = z
  .object({ team_name: z.string().nullish() })
  .passthrough()
  .nullish()

const sleeperUserSchema = z.object({
  user_id: z.string(),
  username: z.string().nullish(),
  display_name: z.string().nullish(),
  metadata: teamNameMetadataSchema,
})

export type SleeperUser = z.infer<typeof sleeperUserSchema>

const sleeperRosterSchema = z.object({
  roster_id: z.number(),
  owner_id: z.string().nullish(),
  players: z.array(z.string()).nullish(),
  metadata: teamNameMetadataSchema,
  settings: teamNameMetadataSchema,
})

export type SleeperRoster = z.infer<typeof sleeperRosterSchema>

const sleeperTransactionSchema = z.object({
  transaction_id: z.union([z.string(), z.number()]).transform(String),
  type: z.string(),
  status: z.string(),
  roster_ids: z.array(z.number()).nullish().transform((ids) => ids ?? []),
  adds: z.record(z.string(), z.number()).nullish().transform((adds) => adds ?? {}),
  created: z.number().optional(),
  status_updated: z.number().optional(),
})

export type SleeperTransaction = z.infer<typeof sleeperTransactionSchema>

export interface SleeperPlayer {
  full_name?: string
  first_name?: string
  last_name?: string
  position?: string
  team?: string | null
}

export interface SleeperRequestOptions {
  timeoutMs?: number
}

async function sleeperGet(path: string, opts: SleeperRequestOptions = {}): Promise<unknown> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
  let response: Response
  try {
    response = await fetch(`${SLEEPER_API_BASE}${path}`, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    })
  } catch (error) {
    throw new TransientFetchError(`Sleeper GET ${path} failed: ${errorMessage(error)}`, {
      source: 'sleeper',
      cause: error,
    })
  }

  if (!response.ok) {
    throw new TransientFetchError(`Sleeper GET ${path} returned ${response.status}`, {
      source: 'sleeper',
      status: response.status,
    })
  }

  try {
    return await response.json()
  } catch (error) {
    throw new MalformedDataError(`Sleeper GET ${path} returned invalid JSON`, {
      source: 'sleeper',
      cause: error,
    })
  }
}

/**
 * Parse an array payload item by item. Items that fail validation are skipped
 * so one bad entry does not discard the rest of the batch.
 */
function parseEach<T extends z.ZodTypeAny>(
  data: unknown,
  schema: T,
  what: string
): z.output<T>[] {
  if (!Array.isArray(data)) {
    throw new MalformedDataError(`Sleeper ${what} payload is not an array`, { source: 'sleeper' })
  }

  const out: z.output<T>[] = []
  data.forEach((item, idx) => {
    const parsed = schema.safeParse(item)
    if (parsed.success) {
      out.push(parsed.data)
    } else {
      console.warn(`[Sleeper] Skipping malformed ${what}[${idx}]: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
    }
  })
  return out
}

export async function getLeagueUsers(leagueId: string, opts?: SleeperRequestOptions): Promise<SleeperUser[]> {
  const data = await sleeperGet(`/league/${leagueId}/users`, opts)
  return parseEach(data, sleeperUserSchema, 'user')
}

export async function getLeagueRosters(leagueId: string, opts?: SleeperRequestOptions): Promise<SleeperRoster[]> {
  const data = await sleeperGet(`/league/${leagueId}/rosters`, opts)
  return parseEach(data, sleeperRosterSchema, 'roster')
}

export async function getLeagueTransactions(
  leagueId: string,
  week: number,
  opts?: SleeperRequestOptions
): Promise<SleeperTransaction[]> {
  const data = await sleeperGet(`/league/${leagueId}/transactions/${week}`, opts)
  return parseEach(data, sleeperTransactionSchema, 'transaction')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

/**
 * Full NFL player directory keyed by Sleeper player id. Entries that are not
 * objects are dropped; unknown fields are ignored.
 */
export async function getAllPlayers(opts?: SleeperRequestOptions): Promise<Record<string, SleeperPlayer>> {
  const data = await sleeperGet('/players/nfl', opts)
  if (!isRecord(data)) {
    throw new MalformedDataError('Sleeper player directory is not an object', { source: 'sleeper' })
  }

  const players: Record<string, SleeperPlayer> = {}
  for (const [id, entry] of Object.entries(data)) {
    if (!isRecord(entry)) continue
    players[id] = {
      full_name: optionalString(entry.full_name),
      first_name: optionalString(entry.first_name),
      last_name: optionalString(entry.last_name),
      position: optionalString(entry.position),
      team: optionalString(entry.team) ?? null,
    }
  }
  return players
}

/**
 * Display name for a player id. Team defenses have no full_name, only
 * first/last ("Buffalo" "Bills"). Unknown ids fall back to the raw id.
 */
export function getPlayerName(players: Record<string, SleeperPlayer>, playerId: string): string {
  const player = players[playerId]
  if (!player) return playerId
  if (player.full_name) return player.full_name
  const joined = [player.first_name, player.last_name].filter(Boolean).join(' ')
  return joined || playerId
}
