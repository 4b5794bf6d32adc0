/**
 * In-memory player value table read by the name resolver. Only the value
 * ingestor (and the one-time startup seed) replace its contents.
 */
export class PlayerValueTable {
  private entries: ReadonlyMap<string, number> = new Map()
  private label = 'unknown'
  private lastReplacedAt: Date | null = null

  replaceAll(entries: ReadonlyMap<string, number>, sourceLabel: string, at: Date = new Date()): void {
    this.entries = new Map(entries)
    this.label = sourceLabel
    this.lastReplacedAt = at
  }

  get(name: string): number | undefined {
    return this.entries.get(name)
  }

  has(name: string): boolean {
    return this.entries.has(name)
  }

  names(): Iterable<string> {
    return this.entries.keys()
  }

  snapshot(): ReadonlyMap<string, number> {
    return this.entries
  }

  get size(): number {
    return this.entries.size
  }

  get sourceLabel(): string {
    return this.label
  }

  get updatedAt(): Date | null {
    return this.lastReplacedAt
  }
}
