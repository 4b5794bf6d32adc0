export interface TradeAsset {
  playerId: string
  displayName: string
  /** Key in the value table the name resolved to, null when unresolved. */
  matchedName: string | null
  value: number
}

export interface TradeSide {
  rosterId: number
  team: string
  assetNames: string[]
  assets: TradeAsset[]
}

export type TradeVerdict =
  | { kind: 'fair'; difference: number }
  | { kind: 'lopsided'; winner: 'A' | 'B'; margin: number }

export interface TradeEvent {
  transactionId: string
  week: number
  sideA: TradeSide
  sideB: TradeSide
  valueA: number
  valueB: number
  verdict: TradeVerdict
  detectedAt: Date
}

export type AnnounceResult = { ok: true } | { ok: false; error: string }

/** Where completed trades are delivered. */
export interface TradeAnnouncer {
  announce(event: TradeEvent): Promise<AnnounceResult>
}

export type PollCycleStatus = 'completed' | 'skipped' | 'aborted'

export interface PollCycleReport {
  status: PollCycleStatus
  week: number
  fetched: number
  qualifying: number
  announced: number
  failed: number
  error?: string
}
