/**
 * Example metrics to use with a {@link BKTree}.
 * @module
 */

/**
 * Number of bit positions at which two 32-bit integers differ.
 */
export function hammingDistance(a: number, b: number): number {
  let bits = (a ^ b) >>> 0
  let count = 0
  while (bits !== 0) {
    bits &= bits - 1
    count++
  }
  return count
}

/**
 * Minimum number of single character insertions, deletions or substitutions
 * needed to turn `a` into `b`. Characters are Unicode code points, so a
 * surrogate pair counts as one character.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) {
    return 0
  }
  const as = Array.from(a)
  const bs = Array.from(b)
  if (as.length === 0) {
    return bs.length
  }
  if (bs.length === 0) {
    return as.length
  }

  // row[i] is the distance between as[0..i) and the prefix of bs seen so far
  const row = Array.from({ length: as.length + 1 }, (_, i) => i)
  for (let j = 1; j <= bs.length; j++) {
    let diagonal = row[0]
    row[0] = j
    for (let i = 1; i <= as.length; i++) {
      const above = row[i]
      const cost = as[i - 1] === bs[j - 1] ? 0 : 1
      row[i] = Math.min(above + 1, row[i - 1] + 1, diagonal + cost)
      diagonal = above
    }
  }
  return row[as.length]
}
