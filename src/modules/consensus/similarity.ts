/**
 * Text similarity for grouping proposed fixes.
 *
 * Ratcliff/Obershelp ratio (2·M / T, where M is the number of characters in
 * recursively found longest common blocks and T the combined length) over
 * whitespace-normalized text.
 */

/** Collapse every run of whitespace to a single space and trim */
export function normalizeWhitespace(text: string): string {
  return text.split(/\s+/).filter((part) => part.length > 0).join(' ')
}

interface Match {
  i: number
  j: number
  size: number
}

function indexPositions(b: string): Map<string, number[]> {
  const b2j = new Map<string, number[]>()
  for (let j = 0; j < b.length; j++) {
    const ch = b.charAt(j)
    const positions = b2j.get(ch)
    if (positions === undefined) b2j.set(ch, [j])
    else positions.push(j)
  }
  return b2j
}

/**
 * Longest common block of a[alo:ahi] and b[blo:bhi]; earliest in `a`, then
 * earliest in `b`, on ties.
 */
function findLongestMatch(
  a: string,
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): Match {
  let best: Match = { i: alo, j: blo, size: 0 }
  let j2len = new Map<number, number>()

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>()
    for (const j of b2j.get(a.charAt(i)) ?? []) {
      if (j < blo) continue
      if (j >= bhi) break
      const k = (j2len.get(j - 1) ?? 0) + 1
      next.set(j, k)
      if (k > best.size) best = { i: i - k + 1, j: j - k + 1, size: k }
    }
    j2len = next
  }
  return best
}

/** Total size of the recursively matched blocks between `a` and `b` */
export function matchingCharacters(a: string, b: string): number {
  const b2j = indexPositions(b)
  const queue: [number, number, number, number][] = [[0, a.length, 0, b.length]]
  let total = 0

  while (queue.length > 0) {
    const range = queue.pop()
    if (range === undefined) break
    const [alo, ahi, blo, bhi] = range
    const m = findLongestMatch(a, b2j, alo, ahi, blo, bhi)
    if (m.size === 0) continue
    total += m.size
    if (alo < m.i && blo < m.j) queue.push([alo, m.i, blo, m.j])
    if (m.i + m.size < ahi && m.j + m.size < bhi) queue.push([m.i + m.size, ahi, m.j + m.size, bhi])
  }
  return total
}

/**
 * Similarity of two fix texts in [0, 1].
 *
 * 0 when either side is empty, 1 for texts equal after whitespace
 * normalization. Arguments are ordered before matching so that
 * `similarity(a, b) === similarity(b, a)`.
 */
export function similarity(text1: string, text2: string): number {
  if (text1.length === 0 || text2.length === 0) return 0

  const n1 = normalizeWhitespace(text1)
  const n2 = normalizeWhitespace(text2)
  if (n1.length === 0 || n2.length === 0) return 0
  if (n1 === n2) return 1

  const [a, b] = n1 < n2 ? [n1, n2] : [n2, n1]
  return (2 * matchingCharacters(a, b)) / (a.length + b.length)
}
