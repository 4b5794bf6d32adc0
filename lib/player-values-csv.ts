import { DEFAULT_VALUES_CSV_URL, type ValueColumn } from './config'
import { MalformedDataError, TransientFetchError, errorMessage } from './errors'

export interface ParsedPlayerValues {
  values: Map<string, number>
  skipped: number
}

/** A bulk source of canonical player name -> value pairs. */
export interface PlayerValueSource {
  readonly label: string
  fetchValues(): Promise<Map<string, number>>
}

export function parseCSVLine(line: string): string[] {
  const values: string[] = []
  let current = ''
  let inQuotes = false

  for (let i = 0; i < line.length; i++) {
    const char = line[i]

    if (char === '"' && inQuotes && line[i + 1] === '"') {
      current += '"'
      i++
    } else if (char === '"') {
      inQuotes = !inQuotes
    } else if (char === ',' && !inQuotes) {
      values.push(current.trim())
      current = ''
    } else {
      current += char
    }
  }

  values.push(current.trim())
  return values
}

/**
 * Parse a player values CSV. The header row locates the `player` column and
 * the requested value column; rows with no name or a non-numeric value are
 * skipped. A name that appears twice keeps its last value.
 */
export function parsePlayerValuesCSV(content: string, column: ValueColumn): ParsedPlayerValues {
  const lines = content.split(/\r?\n/).filter((line) => line.trim())
  if (lines.length === 0) {
    throw new MalformedDataError('Player values CSV is empty', { source: 'player-values' })
  }

  const header = parseCSVLine(lines[0])
  const nameIdx = header.indexOf('player')
  const valueIdx = header.indexOf(column)
  if (nameIdx < 0 || valueIdx < 0) {
    throw new MalformedDataError(`Player values CSV header is missing "player" or "${column}"`, {
      source: 'player-values',
    })
  }

  const values = new Map<string, number>()
  let skipped = 0

  for (let i = 1; i < lines.length; i++) {
    const fields = parseCSVLine(lines[i])
    const name = fields[nameIdx] ?? ''
    const raw = fields[valueIdx] ?? ''
    const value = Number(raw)

    if (!name || !raw || !Number.isFinite(value)) {
      const error = new MalformedDataError(`Skipping CSV row ${i + 1}: invalid name or value`, {
        source: 'player-values',
      })
      console.warn(`[PlayerValues] ${error.message}`)
      skipped++
      continue
    }
    values.set(name, value)
  }

  return { values, skipped }
}

export interface DynastyProcessSourceOptions {
  url?: string
  column?: ValueColumn
  timeoutMs: number
}

export class DynastyProcessCsvSource implements PlayerValueSource {
  readonly label = 'DynastyProcess CSV'
  private readonly url: string
  private readonly column: ValueColumn

  constructor(private readonly opts: DynastyProcessSourceOptions) {
    this.url = opts.url ?? DEFAULT_VALUES_CSV_URL
    this.column = opts.column ?? 'value_1qb'
  }

  async fetchValues(): Promise<Map<string, number>> {
    let response: Response
    try {
      response = await fetch(this.url, { signal: AbortSignal.timeout(this.opts.timeoutMs) })
    } catch (error) {
      throw new TransientFetchError(`Player values download failed: ${errorMessage(error)}`, {
        source: 'player-values',
        cause: error,
      })
    }

    if (!response.ok) {
      throw new TransientFetchError(`Player values download returned ${response.status}`, {
        source: 'player-values',
        status: response.status,
      })
    }

    const { values, skipped } = parsePlayerValuesCSV(await response.text(), this.column)
    console.log(`[PlayerValues] Parsed ${values.size} players from CSV (${skipped} rows skipped)`)
    return values
  }
}
