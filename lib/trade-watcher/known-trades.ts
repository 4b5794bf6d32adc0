/**
 * Transaction ids already announced during this process run. Ids are only
 * ever added.
 */
export class KnownTradeSet {
  private readonly ids = new Set<string>()

  has(transactionId: string): boolean {
    return this.ids.has(transactionId)
  }

  add(transactionId: string): void {
    this.ids.add(transactionId)
  }

  get size(): number {
    return this.ids.size
  }

  values(): string[] {
    return [...this.ids]
  }
}
