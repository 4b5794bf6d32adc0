import { errorMessage } from '../errors'
import type { AnnounceResult, TradeAnnouncer, TradeEvent, TradeSide } from './types'

const EMBED_COLOR_GREEN = 0x2ecc71

export function formatValue(value: number): string {
  return value.toLocaleString('en-US')
}

function receivedList(side: TradeSide): string {
  return side.assetNames.join(', ') || 'None'
}

export function describeVerdict(event: TradeEvent): string {
  const { verdict } = event
  if (verdict.kind === 'fair') return 'Fair trade!'
  const winner = verdict.winner === 'A' ? event.sideA : event.sideB
  return `${winner.team} wins by ${formatValue(verdict.margin)} points!`
}

export interface DiscordEmbed {
  title: string
  color: number
  timestamp: string
  fields: Array<{ name: string; value: string; inline: boolean }>
  footer: { text: string }
}

export function buildTradeEmbed(event: TradeEvent): DiscordEmbed {
  const { sideA, sideB } = event
  return {
    title: '🔁 New Trade Completed!',
    color: EMBED_COLOR_GREEN,
    timestamp: event.detectedAt.toISOString(),
    fields: [
      { name: `🔮 ${sideA.team} gets`, value: receivedList(sideA), inline: false },
      { name: `🔧 ${sideB.team} gets`, value: receivedList(sideB), inline: false },
      {
        name: '💰 Player Value',
        value: `${sideA.team}: ${formatValue(event.valueA)} | ${sideB.team}: ${formatValue(event.valueB)}`,
        inline: false,
      },
    ],
    footer: { text: `${event.verdict.kind === 'fair' ? '🤝' : '✅'} ${describeVerdict(event)}` },
  }
}

export function formatTradeText(event: TradeEvent): string {
  const { sideA, sideB } = event
  return [
    `Trade ${event.transactionId} (Week ${event.week})`,
    `  ${sideA.team} gets: ${receivedList(sideA)}`,
    `  ${sideB.team} gets: ${receivedList(sideB)}`,
    `  Value: ${sideA.team} ${formatValue(event.valueA)} | ${sideB.team} ${formatValue(event.valueB)}`,
    `  ${describeVerdict(event)}`,
  ].join('\n')
}

export interface DiscordWebhookOptions {
  webhookUrl: string
  timeoutMs: number
}

export class DiscordWebhookAnnouncer implements TradeAnnouncer {
  constructor(private readonly opts: DiscordWebhookOptions) {}

  async announce(event: TradeEvent): Promise<AnnounceResult> {
    try {
      const response = await fetch(this.opts.webhookUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ embeds: [buildTradeEmbed(event)] }),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      })

      if (!response.ok) {
        console.error(`[Announcer] Discord webhook returned ${response.status} for ${event.transactionId}`)
        return { ok: false, error: `HTTP ${response.status}` }
      }
      return { ok: true }
    } catch (error) {
      const message = errorMessage(error)
      console.error(`[Announcer] Failed to send trade ${event.transactionId}: ${message}`)
      return { ok: false, error: message }
    }
  }
}

export class ConsoleAnnouncer implements TradeAnnouncer {
  async announce(event: TradeEvent): Promise<AnnounceResult> {
    console.log(`[Announcer] ${formatTradeText(event)}`)
    return { ok: true }
  }
}
