import type { TradeVerdict } from './types'

export const DEFAULT_FAIRNESS_THRESHOLD = 200

/**
 * A trade is fair when the sides are within `threshold` of each other;
 * otherwise the side with more value wins by the difference.
 */
export function judgeTrade(valueA: number, valueB: number, threshold = DEFAULT_FAIRNESS_THRESHOLD): TradeVerdict {
  const diff = valueA - valueB
  if (Math.abs(diff) < threshold) {
    return { kind: 'fair', difference: Math.abs(diff) }
  }
  return { kind: 'lopsided', winner: diff > 0 ? 'A' : 'B', margin: Math.abs(diff) }
}
