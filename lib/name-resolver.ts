import type { ManualOverrideTable } from './manual-overrides'
import { findClosestMatch } from './name-matching'
import type { ValueStore } from './value-store'
import type { PlayerValueTable } from './value-table'
import { errorMessage } from './errors'

export type ResolutionMethod = 'exact' | 'override' | 'fuzzy' | 'none'

export interface NameResolution {
  value: number
  canonicalName: string | null
  method: ResolutionMethod
}

export interface NameResolverOptions {
  cutoff?: number
  /** Used only for near-miss diagnostics when nothing matches. */
  store?: Pick<ValueStore, 'findLike'>
}

export const DEFAULT_FUZZY_CUTOFF = 0.5

/**
 * Maps a player name as it appears in the league feed (or as typed by a
 * user) to a value from the in-memory table. Order: manual override, exact
 * key, closest key above the cutoff. An unknown name is worth 0.
 */
export class NameResolver {
  private readonly cutoff: number
  private readonly store: Pick<ValueStore, 'findLike'> | null

  constructor(
    private readonly table: PlayerValueTable,
    private readonly overrides: ManualOverrideTable,
    opts: NameResolverOptions = {}
  ) {
    this.cutoff = opts.cutoff ?? DEFAULT_FUZZY_CUTOFF
    this.store = opts.store ?? null
  }

  resolve(inputName: string): NameResolution {
    const trimmed = inputName.trim()
    const overridden = Object.hasOwn(this.overrides, trimmed)
    const name = overridden ? this.overrides[trimmed] : trimmed

    const exact = this.table.get(name)
    if (exact !== undefined) {
      return { value: exact, canonicalName: name, method: overridden ? 'override' : 'exact' }
    }

    const closest = findClosestMatch(name, this.table.names(), this.cutoff)
    if (closest) {
      const value = this.table.get(closest.candidate) ?? 0
      return { value, canonicalName: closest.candidate, method: 'fuzzy' }
    }

    return { value: 0, canonicalName: null, method: 'none' }
  }

  /**
   * Same result as `resolve`. On a miss, logs names in the persistent store
   * that contain the input to help spot missing overrides.
   */
  async lookup(inputName: string): Promise<NameResolution> {
    const resolution = this.resolve(inputName)
    if (resolution.method !== 'none') return resolution

    const trimmed = inputName.trim()
    console.warn(`[NameResolver] No match found for '${trimmed}'`)
    if (this.store && trimmed) {
      try {
        const similar = await this.store.findLike(trimmed)
        if (similar.length > 0) {
          console.warn(`[NameResolver] Stored names similar to '${trimmed}': ${similar.join(', ')}`)
        }
      } catch (error) {
        console.warn(`[NameResolver] Near-miss lookup failed: ${errorMessage(error)}`)
      }
    }
    return resolution
  }
}
