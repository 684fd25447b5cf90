/**
 * Disjoint-set forest over integer indices
 * @module graph/union-find
 */

/**
 * Union-find keyed by dense indices `0..size-1`.
 * Parents and ranks live in flat arrays; no node objects are allocated.
 */
export class DisjointSet {
  private readonly parent: Int32Array
  private readonly rank: Uint8Array

  constructor(size: number) {
    this.parent = new Int32Array(size)
    this.rank = new Uint8Array(size)
    for (let i = 0; i < size; i++) {
      this.parent[i] = i
    }
  }

  /**
   * Representative of the set containing `index` (path halving)
   */
  find(index: number): number {
    let current = index
    while (this.parent[current] !== current) {
      const grandparent = this.parent[this.parent[current]]
      this.parent[current] = grandparent
      current = grandparent
    }
    return current
  }

  /**
   * Joins the sets of `a` and `b`. Returns false when already joined.
   */
  union(a: number, b: number): boolean {
    const rootA = this.find(a)
    const rootB = this.find(b)
    if (rootA === rootB) return false

    if (this.rank[rootA] < this.rank[rootB]) {
      this.parent[rootA] = rootB
    } else if (this.rank[rootA] > this.rank[rootB]) {
      this.parent[rootB] = rootA
    } else {
      this.parent[rootB] = rootA
      this.rank[rootA] += 1
    }
    return true
  }

  /**
   * Members of every set, each list ascending, lists ordered by their
   * smallest member
   */
  components(): number[][] {
    const byRoot = new Map<number, number[]>()
    const ordered: number[][] = []
    for (let i = 0; i < this.parent.length; i++) {
      const root = this.find(i)
      let members = byRoot.get(root)
      if (!members) {
        members = []
        byRoot.set(root, members)
        ordered.push(members)
      }
      members.push(i)
    }
    return ordered
  }
}
