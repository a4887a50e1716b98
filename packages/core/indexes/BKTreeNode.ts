export type DumpedNode<K> = {
  key: K
  children: [label: number, child: DumpedNode<K>][]
}

export class BKTreeNode<K> {
  private readonly _children = new Map<number, BKTreeNode<K>>()

  constructor(readonly key: K) {}

  /**
   * Children keyed by their distance to this node's key, in the order they
   * were attached.
   */
  get children(): ReadonlyMap<number, BKTreeNode<K>> {
    return this._children
  }

  childAt(label: number): BKTreeNode<K> | undefined {
    return this._children.get(label)
  }

  /**
   * Attaches a new node holding `key` under the edge `label`.
   *
   * The caller must have measured `label` as the distance from this node's
   * key to `key`; there can only ever be one child per label.
   */
  attach(label: number, key: K): BKTreeNode<K> {
    if (this._children.has(label)) {
      throw new Error(`Node already has a child at distance ${label}`)
    }
    const child = new BKTreeNode(key)
    this._children.set(label, child)
    return child
  }

  toString(): string {
    return `BKTreeNode(${String(this.key)}, labels=[${
      [...this._children.keys()].join(", ")
    }])`
  }
}
