/**
 * A discrete metric over keys of type `K`.
 *
 * Implementations must return non-negative integers, return 0 only for keys
 * that are considered equal, be symmetric, and satisfy the triangle
 * inequality `d(a, c) <= d(a, b) + d(b, c)`. None of this is checked at
 * runtime: a function that breaks these rules makes searches miss matches.
 */
export type Distance<K> = (a: K, b: K) => number

/**
 * A stored key found by a range search, with its distance to the query.
 */
export type Match<K> = { key: K; distance: number }
