import { z } from 'zod'

export type ManualOverrideTable = Readonly<Record<string, string>>

/** Common shorthand and alternate spellings mapped to the name the value feed uses. */
export const DEFAULT_MANUAL_OVERRIDES: ManualOverrideTable = Object.freeze({
  'Ken Walker': 'Kenneth Walker III',
  'DJ Moore': 'D.J. Moore',
  'CMC': 'Christian McCaffrey',
  'JJ': 'Justin Jefferson',
  'Bijan': 'Bijan Robinson',
  'Tyreek': 'Tyreek Hill',
})

const overrideFileSchema = z.record(z.string().trim().min(1), z.string().trim().min(1))

export function parseManualOverrides(json: string): Record<string, string> {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch {
    throw new Error('Failed to parse manual overrides JSON')
  }

  const result = overrideFileSchema.safeParse(parsed)
  if (!result.success) {
    throw new Error('Manual overrides must be an object of alias -> canonical name strings')
  }
  return result.data
}

export function buildOverrideTable(extra: Record<string, string> = {}): ManualOverrideTable {
  return Object.freeze({ ...DEFAULT_MANUAL_OVERRIDES, ...extra })
}
