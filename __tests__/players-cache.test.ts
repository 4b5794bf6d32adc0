import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { PlayerDirectory } from '@/lib/sleeper/players-cache'
import type { SleeperPlayer } from '@/lib/sleeper-client'

const PLAYERS: Record<string, SleeperPlayer> = {
  '4046': { full_name: 'Patrick Mahomes' },
  KC: { first_name: 'Kansas City', last_name: 'Chiefs' },
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('PlayerDirectory', () => {
  it('maps ids to display names', async () => {
    const fetchPlayers = vi.fn().mockResolvedValue(PLAYERS)
    const directory = new PlayerDirectory({ ttlMs: 60_000, timeoutMs: 5000, fetchPlayers, now: () => 0 })

    const names = await directory.getNames()
    expect(names).toEqual(
      new Map([
        ['4046', 'Patrick Mahomes'],
        ['KC', 'Kansas City Chiefs'],
      ])
    )
    expect(directory.size).toBe(2)
  })

  it('gives the large directory download at least 15 seconds', async () => {
    const fetchPlayers = vi.fn().mockResolvedValue(PLAYERS)
    const directory = new PlayerDirectory({ ttlMs: 60_000, timeoutMs: 5000, fetchPlayers })

    await directory.getNames()
    expect(fetchPlayers).toHaveBeenCalledWith(15_000)
  })

  it('serves the cached copy until the TTL expires', async () => {
    let now = 0
    const fetchPlayers = vi.fn().mockResolvedValue(PLAYERS)
    const directory = new PlayerDirectory({ ttlMs: 60_000, timeoutMs: 20_000, fetchPlayers, now: () => now })

    await directory.getNames()
    now = 59_999
    await directory.getNames()
    expect(fetchPlayers).toHaveBeenCalledTimes(1)

    now = 60_000
    await directory.getNames()
    expect(fetchPlayers).toHaveBeenCalledTimes(2)
    expect(fetchPlayers).toHaveBeenLastCalledWith(20_000)
  })

  it('falls back to the stale copy when a refresh fails', async () => {
    let now = 0
    const fetchPlayers = vi.fn().mockResolvedValueOnce(PLAYERS).mockRejectedValueOnce(new Error('timeout'))
    const directory = new PlayerDirectory({ ttlMs: 1000, timeoutMs: 5000, fetchPlayers, now: () => now })

    const first = await directory.getNames()
    now = 5000
    await expect(directory.getNames()).resolves.toBe(first)
  })

  it('rethrows when there is nothing cached', async () => {
    const fetchPlayers = vi.fn().mockRejectedValue(new Error('timeout'))
    const directory = new PlayerDirectory({ ttlMs: 1000, timeoutMs: 5000, fetchPlayers })

    await expect(directory.getNames()).rejects.toThrow('timeout')
  })
})
