import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from 'vitest'
import { MalformedDataError, TransientFetchError } from '@/lib/errors'
import { getAllPlayers, getLeagueTransactions, getLeagueUsers, getPlayerName } from '@/lib/sleeper-client'

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}

let fetchMock: Mock<typeof fetch>

beforeEach(() => {
  fetchMock = vi.fn<typeof fetch>()
  vi.stubGlobal('fetch', fetchMock)
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

afterEach(() => {
  vi.unstubAllGlobals()
  vi.restoreAllMocks()
})

describe('getLeagueTransactions', () => {
  it('normalises ids and defaults missing collections', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse([
        { transaction_id: 987, type: 'trade', status: 'complete', roster_ids: [1, 2], adds: { '4046': 1 } },
        { transaction_id: 'abc', type: 'waiver', status: 'complete', roster_ids: null, adds: null },
      ])
    )

    const txns = await getLeagueTransactions('123', 3, { timeoutMs: 2000 })

    expect(fetchMock.mock.calls[0][0]).toBe('https://api.sleeper.app/v1/league/123/transactions/3')
    expect(fetchMock.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal)
    expect(txns).toEqual([
      { transaction_id: '987', type: 'trade', status: 'complete', roster_ids: [1, 2], adds: { '4046': 1 } },
      { transaction_id: 'abc', type: 'waiver', status: 'complete', roster_ids: [], adds: {} },
    ])
  })

  it('skips malformed items and keeps the rest', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse([
        { transaction_id: 'bad', status: 'complete' },
        { transaction_id: 'good', type: 'trade', status: 'complete', roster_ids: [3, 4], adds: {} },
      ])
    )

    const txns = await getLeagueTransactions('123', 1)
    expect(txns.map((t) => t.transaction_id)).toEqual(['good'])
    expect(console.warn).toHaveBeenCalledTimes(1)
  })

  it('raises MalformedDataError when the payload is not an array', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: 'nope' }))
    await expect(getLeagueTransactions('123', 1)).rejects.toBeInstanceOf(MalformedDataError)
  })

  it('raises MalformedDataError on invalid JSON', async () => {
    fetchMock.mockResolvedValue(new Response('<html>', { status: 200 }))
    await expect(getLeagueTransactions('123', 1)).rejects.toBeInstanceOf(MalformedDataError)
  })

  it('raises TransientFetchError with the status on non-2xx', async () => {
    fetchMock.mockResolvedValue(jsonResponse(null, 404))
    await expect(getLeagueTransactions('123', 1)).rejects.toMatchObject({
      name: 'TransientFetchError',
      source: 'sleeper',
      status: 404,
    })
  })

  it('raises TransientFetchError when the request fails', async () => {
    fetchMock.mockRejectedValue(new DOMException('The operation was aborted due to timeout', 'TimeoutError'))
    await expect(getLeagueTransactions('123', 1)).rejects.toBeInstanceOf(TransientFetchError)
  })
})

describe('getLeagueUsers', () => {
  it('parses users with optional metadata', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse([
        { user_id: 'u1', display_name: 'alice', metadata: { team_name: 'Alpha Dogs', avatar: 'x' } },
        { user_id: 'u2', display_name: 'bob', metadata: null },
      ])
    )

    const users = await getLeagueUsers('123')
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.sleeper.app/v1/league/123/users')
    expect(users.map((u) => u.metadata?.team_name ?? null)).toEqual(['Alpha Dogs', null])
  })
})

describe('getAllPlayers', () => {
  it('keeps object entries and names defenses from first and last name', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        '4046': { full_name: 'Patrick Mahomes', position: 'QB', team: 'KC' },
        BUF: { first_name: 'Buffalo', last_name: 'Bills', position: 'DEF', team: 'BUF' },
        junk: 'not a player',
      })
    )

    const players = await getAllPlayers()
    expect(Object.keys(players)).toEqual(['4046', 'BUF'])
    expect(getPlayerName(players, '4046')).toBe('Patrick Mahomes')
    expect(getPlayerName(players, 'BUF')).toBe('Buffalo Bills')
    expect(getPlayerName(players, '9999')).toBe('9999')
  })

  it('rejects a directory that is not an object', async () => {
    fetchMock.mockResolvedValue(jsonResponse([]))
    await expect(getAllPlayers()).rejects.toBeInstanceOf(MalformedDataError)
  })
})
