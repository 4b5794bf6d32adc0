import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import {
  ConsoleAnnouncer,
  DiscordWebhookAnnouncer,
  buildTradeEmbed,
  describeVerdict,
  formatTradeText,
} from '@/lib/trade-watcher/announcer'
import type { TradeEvent } from '@/lib/trade-watcher/types'

function makeEvent(overrides: Partial<TradeEvent> = {}): TradeEvent {
  return {
    transactionId: '1122334455',
    week: 3,
    sideA: {
      rosterId: 1,
      team: 'Alpha',
      assetNames: ['Justin Jefferson'],
      assets: [{ playerId: '6794', displayName: 'Justin Jefferson', matchedName: 'Justin Jefferson', value: 2000 }],
    },
    sideB: {
      rosterId: 2,
      team: 'Bravo',
      assetNames: ['Bijan Robinson', 'Tyreek Hill'],
      assets: [
        { playerId: '9509', displayName: 'Bijan Robinson', matchedName: 'Bijan Robinson', value: 2000 },
        { playerId: '3321', displayName: 'Tyreek Hill', matchedName: 'Tyreek Hill', value: 1500 },
      ],
    },
    valueA: 2000,
    valueB: 3500,
    verdict: { kind: 'lopsided', winner: 'B', margin: 1500 },
    detectedAt: new Date('2024-09-18T17:00:00Z'),
    ...overrides,
  }
}

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(() => {
  vi.restoreAllMocks()
  vi.unstubAllGlobals()
})

describe('describeVerdict', () => {
  it('names the winning team with a formatted margin', () => {
    expect(describeVerdict(makeEvent())).toBe('Bravo wins by 1,500 points!')
    expect(
      describeVerdict(makeEvent({ verdict: { kind: 'lopsided', winner: 'A', margin: 250 } }))
    ).toBe('Alpha wins by 250 points!')
  })

  it('calls fair trades fair', () => {
    expect(describeVerdict(makeEvent({ verdict: { kind: 'fair', difference: 20 } }))).toBe('Fair trade!')
  })
})

describe('buildTradeEmbed', () => {
  it('lists what each side received, the values and the verdict', () => {
    expect(buildTradeEmbed(makeEvent())).toEqual({
      title: '🔁 New Trade Completed!',
      color: 0x2ecc71,
      timestamp: '2024-09-18T17:00:00.000Z',
      fields: [
        { name: '🔮 Alpha gets', value: 'Justin Jefferson', inline: false },
        { name: '🔧 Bravo gets', value: 'Bijan Robinson, Tyreek Hill', inline: false },
        { name: '💰 Player Value', value: 'Alpha: 2,000 | Bravo: 3,500', inline: false },
      ],
      footer: { text: '✅ Bravo wins by 1,500 points!' },
    })
  })

  it('shows None for a side that received no players', () => {
    const event = makeEvent({
      sideA: { rosterId: 1, team: 'Alpha', assetNames: [], assets: [] },
      valueA: 0,
      valueB: 100,
      verdict: { kind: 'fair', difference: 100 },
    })
    const embed = buildTradeEmbed(event)
    expect(embed.fields[0]).toEqual({ name: '🔮 Alpha gets', value: 'None', inline: false })
    expect(embed.footer.text).toBe('🤝 Fair trade!')
  })
})

describe('DiscordWebhookAnnouncer', () => {
  const webhookUrl = 'https://discord.test/api/webhooks/1/test-token'

  it('posts one embed to the webhook', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 204 }))
    vi.stubGlobal('fetch', fetchMock)

    const announcer = new DiscordWebhookAnnouncer({ webhookUrl, timeoutMs: 5000 })
    await expect(announcer.announce(makeEvent())).resolves.toEqual({ ok: true })

    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe(webhookUrl)
    expect(init?.method).toBe('POST')
    expect(init?.signal).toBeInstanceOf(AbortSignal)
    expect(JSON.parse(String(init?.body))).toEqual({ embeds: [buildTradeEmbed(makeEvent())] })
  })

  it('reports non-2xx responses as failures', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockResolvedValue(new Response('rate limited', { status: 429 })))

    const announcer = new DiscordWebhookAnnouncer({ webhookUrl, timeoutMs: 5000 })
    await expect(announcer.announce(makeEvent())).resolves.toEqual({ ok: false, error: 'HTTP 429' })
  })

  it('reports network errors as failures', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockRejectedValue(new Error('ECONNRESET')))

    const announcer = new DiscordWebhookAnnouncer({ webhookUrl, timeoutMs: 5000 })
    await expect(announcer.announce(makeEvent())).resolves.toEqual({ ok: false, error: 'ECONNRESET' })
  })
})

describe('ConsoleAnnouncer', () => {
  it('logs the trade as text', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    await expect(new ConsoleAnnouncer().announce(makeEvent())).resolves.toEqual({ ok: true })
    expect(log).toHaveBeenCalledWith(`[Announcer] ${formatTradeText(makeEvent())}`)
    expect(formatTradeText(makeEvent())).toBe(
      [
        'Trade 1122334455 (Week 3)',
        '  Alpha gets: Justin Jefferson',
        '  Bravo gets: Bijan Robinson, Tyreek Hill',
        '  Value: Alpha 2,000 | Bravo 3,500',
        '  Bravo wins by 1,500 points!',
      ].join('\n')
    )
  })
})
