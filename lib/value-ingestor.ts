import { PersistenceUnavailableError, errorMessage } from './errors'
import type { PlayerValueSource } from './player-values-csv'
import type { ValueStore } from './value-store'
import type { PlayerValueTable } from './value-table'

export type RefreshResult =
  | { status: 'updated'; count: number; source: string }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string }

export interface RefreshOptions {
  /** Manual refreshes rethrow persistence failures to the caller. */
  manual?: boolean
}

/**
 * Replaces the in-memory value table from a bulk source, all or nothing.
 * The store is written before the table so a failed write leaves both the
 * table and the store as they were.
 */
export class ValueIngestor {
  private inFlight = false

  constructor(
    private readonly source: PlayerValueSource,
    private readonly table: PlayerValueTable,
    private readonly store: ValueStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  get running(): boolean {
    return this.inFlight
  }

  /** A call made while another refresh is running is skipped, never queued. */
  async refresh(opts: RefreshOptions = {}): Promise<RefreshResult> {
    if (this.inFlight) {
      console.log('[ValueIngestor] SKIPPED (refresh already running)')
      return { status: 'skipped', reason: 'refresh already running' }
    }

    this.inFlight = true
    try {
      return await this.load(opts)
    } finally {
      this.inFlight = false
    }
  }

  private async load(opts: RefreshOptions): Promise<RefreshResult> {
    let values: Map<string, number>
    try {
      values = await this.source.fetchValues()
    } catch (error) {
      const reason = errorMessage(error)
      console.error(`[ValueIngestor] Error loading ${this.source.label} data: ${reason}`)
      return { status: 'skipped', reason }
    }

    if (values.size === 0) {
      console.warn(`[ValueIngestor] No values found in ${this.source.label}`)
      return { status: 'skipped', reason: 'no rows parsed' }
    }

    try {
      await this.store.upsertMany(values)
    } catch (error) {
      if (opts.manual && error instanceof PersistenceUnavailableError) throw error
      const message = errorMessage(error)
      console.error(`[ValueIngestor] Failed to persist values: ${message}`)
      return { status: 'failed', error: message }
    }

    this.table.replaceAll(values, this.source.label, this.now())
    console.log(`[ValueIngestor] Loaded values for ${values.size} players from ${this.source.label}`)
    return { status: 'updated', count: values.size, source: this.source.label }
  }

  /** Seed the table from the persistent store; used once at startup. */
  async seedFromStore(): Promise<number> {
    const stored = await this.store.loadAll()
    if (stored.size > 0) {
      this.table.replaceAll(stored, 'database cache', this.now())
    }
    console.log(`[ValueIngestor] Loaded ${stored.size} players from database cache`)
    return stored.size
  }
}
