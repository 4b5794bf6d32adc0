/**
 * Approximate string matching for player names using the gestalt
 * (Ratcliff/Obershelp) similarity: 2 * M / T, where M is the number of
 * characters in matching blocks and T the combined length of both strings.
 *
 * Matching blocks are found by taking the longest common block, then
 * recursing into the unmatched text on either side of it. When several
 * blocks share the longest length, the one that starts earliest in `a`
 * (then earliest in `b`) wins.
 */

interface Block {
  i: number
  j: number
  size: number
}

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>()
  for (let j = 0; j < b.length; j++) {
    const ch = b[j]
    const list = positions.get(ch)
    if (list) list.push(j)
    else positions.set(ch, [j])
  }
  return positions
}

function longestBlock(
  a: string,
  positions: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): Block {
  let best: Block = { i: alo, j: blo, size: 0 }
  // run length of the match ending at (i - 1, j), keyed by j
  let prevRuns = new Map<number, number>()

  for (let i = alo; i < ahi; i++) {
    const runs = new Map<number, number>()
    for (const j of positions.get(a[i]) ?? []) {
      if (j < blo) continue
      if (j >= bhi) break
      const size = (prevRuns.get(j - 1) ?? 0) + 1
      runs.set(j, size)
      if (size > best.size) {
        best = { i: i - size + 1, j: j - size + 1, size }
      }
    }
    prevRuns = runs
  }
  return best
}

function matchedCharacters(a: string, b: string): number {
  const positions = indexPositions(b)
  let total = 0
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]]

  while (pending.length > 0) {
    const next = pending.pop()
    if (!next) break
    const [alo, ahi, blo, bhi] = next
    const block = longestBlock(a, positions, alo, ahi, blo, bhi)
    if (block.size === 0) continue

    total += block.size
    if (alo < block.i && blo < block.j) {
      pending.push([alo, block.i, blo, block.j])
    }
    if (block.i + block.size < ahi && block.j + block.size < bhi) {
      pending.push([block.i + block.size, ahi, block.j + block.size, bhi])
    }
  }
  return total
}

function ratioOf(matches: number, length: number): number {
  return length > 0 ? (2 * matches) / length : 1
}

/** Upper bound on similarity from lengths alone. */
function lengthBound(a: string, b: string): number {
  return ratioOf(Math.min(a.length, b.length), a.length + b.length)
}

/** Upper bound on similarity from shared characters, ignoring order. */
function characterBound(a: string, b: string): number {
  const available = new Map<string, number>()
  for (const ch of b) available.set(ch, (available.get(ch) ?? 0) + 1)

  let shared = 0
  for (const ch of a) {
    const left = available.get(ch) ?? 0
    if (left > 0) {
      available.set(ch, left - 1)
      shared++
    }
  }
  return ratioOf(shared, a.length + b.length)
}

/**
 * Gestalt similarity of `a` and `b` in [0, 1]. Two empty strings are
 * identical (1). The measure is not guaranteed to be symmetric.
 */
export function similarityRatio(a: string, b: string): number {
  return ratioOf(matchedCharacters(a, b), a.length + b.length)
}

export interface ClosestMatch {
  candidate: string
  score: number
}

/**
 * Best candidate whose similarity to `input` is at least `cutoff`, or null.
 * Equal scores go to the lexicographically greater candidate.
 */
export function findClosestMatch(
  input: string,
  candidates: Iterable<string>,
  cutoff: number
): ClosestMatch | null {
  let best: ClosestMatch | null = null

  for (const candidate of candidates) {
    if (lengthBound(candidate, input) < cutoff) continue
    if (characterBound(candidate, input) < cutoff) continue

    const score = similarityRatio(candidate, input)
    if (score < cutoff) continue

    if (!best || score > best.score || (score === best.score && candidate > best.candidate)) {
      best = { candidate, score }
    }
  }
  return best
}
