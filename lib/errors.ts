export type DataSource = 'sleeper' | 'player-values'

/**
 * Network failure, timeout or non-2xx response from an upstream read.
 * Aborts the current cycle only; the next scheduled cycle retries.
 */
export class TransientFetchError extends Error {
  readonly source: DataSource
  readonly status: number | null

  constructor(message: string, opts: { source: DataSource; status?: number; cause?: unknown }) {
    super(message, { cause: opts.cause })
    this.name = 'TransientFetchError'
    this.source = opts.source
    this.status = opts.status ?? null
  }
}

/**
 * A payload (or one item inside it) did not have the expected shape.
 */
export class MalformedDataError extends Error {
  readonly source: DataSource

  constructor(message: string, opts: { source: DataSource; cause?: unknown }) {
    super(message, { cause: opts.cause })
    this.name = 'MalformedDataError'
    this.source = opts.source
  }
}

export class PersistenceUnavailableError extends Error {
  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, { cause: opts.cause })
    this.name = 'PersistenceUnavailableError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
