/**
 * Small key sets for trying out a BK-tree by hand.
 * @module
 */

export const words: readonly string[] = [
  "book",
  "books",
  "boo",
  "boon",
  "cook",
  "cake",
  "cape",
  "cart",
]

export const integers: readonly number[] = [0, 4, 5, 14, 15]
