import { BKTreeNode, type DumpedNode } from "./BKTreeNode.ts"
import type { Distance, Match } from "../types.ts"
import { InvalidRadiusError } from "../errors.ts"
import { debugJson, debugLog } from "../logging.ts"

/**
 * A Burkhard-Keller tree: an index over keys in a discrete metric space that
 * answers "which stored keys are within distance r of this one" without
 * comparing the query against every key.
 *
 * Every node holds one key, and its children are labelled with their distance
 * to that key. When searching, a child labelled `c` under a node at distance
 * `d` from the query can only lead to matches if `|c - d| <= r`, so all other
 * subtrees are skipped.
 *
 * See https://en.wikipedia.org/wiki/BK-tree for more information.
 *
 * ```ts
 * const tree = BKTree.from(["book", "books", "boo", "cake"], levenshteinDistance)
 * tree.find("bo", 1) // [{ key: "boo", distance: 1 }]
 * ```
 */
export class BKTree<K> implements Iterable<K> {
  private root: BKTreeNode<K> | null = null
  private _size = 0

  constructor(readonly distance: Distance<K>) {}

  static from<K>(keys: Iterable<K>, distance: Distance<K>): BKTree<K> {
    const tree = new BKTree(distance)
    tree.insertAll(keys)
    return tree
  }

  /**
   * The number of distinct keys in the tree.
   */
  get size(): number {
    return this._size
  }

  insertAll(keys: Iterable<K>): void {
    for (const key of keys) {
      this.insert(key)
    }
  }

  /**
   * Adds `key` to the tree.
   *
   * @returns false if a key at distance 0 was already stored, in which case
   * the tree is left untouched.
   */
  insert(key: K): boolean {
    debugLog(() => `BKTree.insert(${debugJson(key)})`)
    if (this.root == null) {
      this.root = new BKTreeNode(key)
      this._size++
      return true
    }
    let current = this.root
    while (true) {
      const label = this.distance(current.key, key)
      if (label === 0) {
        debugLog(() => `  duplicate of ${debugJson(current.key)}`)
        return false
      }
      const next = current.childAt(label)
      if (next == null) {
        const child = current.attach(label, key)
        this._size++
        debugLog(() => `  attached ${child} under ${current}`)
        return true
      }
      current = next
    }
  }

  /**
   * Finds every stored key within `radius` of `query`.
   *
   * Matches come back in breadth-first order of the tree, which says nothing
   * about how close they are. Sort by `distance` if you need a ranking.
   */
  find(query: K, radius: number): Match<K>[] {
    if (!Number.isInteger(radius) || radius < 0) {
      throw new InvalidRadiusError(radius)
    }
    debugLog(() => `BKTree.find(${debugJson(query)}, ${radius})`)
    const found: Match<K>[] = []
    if (this.root == null) {
      return found
    }
    const candidates: BKTreeNode<K>[] = [this.root]
    let visited = 0
    // FIFO: candidates before `visited` have already been processed
    while (visited < candidates.length) {
      const node = candidates[visited++]
      const distance = this.distance(node.key, query)
      if (distance <= radius) {
        found.push({ key: node.key, distance })
      }
      for (const [label, child] of node.children) {
        if (Math.abs(label - distance) <= radius) {
          candidates.push(child)
        }
      }
    }
    debugLog(
      () => `  visited ${visited}/${this._size} nodes, ${found.length} matches`,
    )
    return found
  }

  /**
   * Whether a key at distance 0 from `key` is stored in the tree.
   */
  has(key: K): boolean {
    let current = this.root
    while (current != null) {
      const label = this.distance(current.key, key)
      if (label === 0) {
        return true
      }
      current = current.childAt(label) ?? null
    }
    return false
  }

  /**
   * Iterates over every stored key once, in no particular order.
   */
  *values(): IterableIterator<K> {
    const stack: BKTreeNode<K>[] = this.root == null ? [] : [this.root]
    let node: BKTreeNode<K> | undefined
    while ((node = stack.pop()) != null) {
      stack.push(...node.children.values())
      yield node.key
    }
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this.values()
  }

  /**
   * Returns a plain snapshot of the tree's shape, or null when it is empty.
   */
  dump(): DumpedNode<K> | null {
    if (this.root == null) {
      return null
    }
    const dumped: DumpedNode<K> = { key: this.root.key, children: [] }
    const stack: [BKTreeNode<K>, DumpedNode<K>][] = [[this.root, dumped]]
    let entry: [BKTreeNode<K>, DumpedNode<K>] | undefined
    while ((entry = stack.pop()) != null) {
      const [node, out] = entry
      for (const [label, child] of node.children) {
        const dumpedChild: DumpedNode<K> = { key: child.key, children: [] }
        out.children.push([label, dumpedChild])
        stack.push([child, dumpedChild])
      }
    }
    return dumped
  }
}
