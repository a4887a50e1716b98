import {
  type RandomGenerator,
  unsafeUniformIntDistribution,
  xoroshiro128plus,
} from "pure-rand"
import type { Distance, Match } from "./types.ts"

export function assertType<T>(_value: T) {}

/**
 * This is a type-level test. Pair it with type-fest's `IsEqual`:
 *
 * ```ts
 * assertTrue<IsEqual<"green", "green">>()
 * ```
 */
export function assertTrue<T extends true>() {}

export function randomSeeded(seed: number): RandomGenerator {
  return xoroshiro128plus(seed)
}

export function randomIntegerBetween(
  min: number,
  max: number,
  { prng }: { prng: RandomGenerator },
): number {
  return unsafeUniformIntDistribution(min, max, prng)
}

export function randomString(
  alphabet: string,
  maxLength: number,
  { prng }: { prng: RandomGenerator },
): string {
  const length = randomIntegerBetween(0, maxLength, { prng })
  let s = ""
  for (let i = 0; i < length; i++) {
    s += alphabet[randomIntegerBetween(0, alphabet.length - 1, { prng })]
  }
  return s
}

/**
 * Brute force version of `BKTree.find`, used as an oracle in tests. Keys at
 * distance 0 from an earlier key are dropped, the same way the tree drops
 * them on insert.
 */
export function linearScan<K>(
  keys: Iterable<K>,
  distance: Distance<K>,
  query: K,
  radius: number,
): Match<K>[] {
  const distinct: K[] = []
  for (const key of keys) {
    if (!distinct.some((other) => distance(other, key) === 0)) {
      distinct.push(key)
    }
  }
  return distinct
    .map((key) => ({ key, distance: distance(key, query) }))
    .filter((match) => match.distance <= radius)
}

/**
 * Orders matches by distance, then by key, so that results can be compared
 * without depending on traversal order.
 */
export function sortMatches<K extends string | number>(
  matches: readonly Match<K>[],
): Match<K>[] {
  return [...matches].sort((a, b) =>
    a.distance - b.distance || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0)
  )
}
