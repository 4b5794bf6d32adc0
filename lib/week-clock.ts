import { format } from 'date-fns'

const WEEK_MS = 7 * 24 * 60 * 60 * 1000

/**
 * Derives the league week from the start of week 2. Everything before that
 * instant is week 1.
 */
export class WeekClock {
  private week: number

  constructor(
    readonly week2Start: Date,
    now: Date = new Date()
  ) {
    this.week = this.weekAt(now)
  }

  weekAt(now: Date): number {
    const elapsed = now.getTime() - this.week2Start.getTime()
    if (elapsed < 0) return 1
    return 2 + Math.floor(elapsed / WEEK_MS)
  }

  /** Before week 2 the current value is left as is, so an early override holds. */
  recompute(now: Date = new Date()): number {
    if (now.getTime() >= this.week2Start.getTime()) this.week = this.weekAt(now)
    console.log(`[WeekClock] Week ${this.week} as of ${format(now, 'yyyy-MM-dd HH:mm')}`)
    return this.week
  }

  currentWeek(): number {
    return this.week
  }

  /** Holds until a recompute on or after the week 2 start replaces it. */
  override(week: number): void {
    if (!Number.isInteger(week) || week < 1) {
      throw new RangeError(`Week must be a positive integer, got ${week}`)
    }
    this.week = week
    console.log(`[WeekClock] Week manually set to ${week}`)
  }
}
