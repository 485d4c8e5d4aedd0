/**
 * Union-Find (Disjoint Set Union) over a contiguous id space.
 *
 * Path compression plus union by rank give near-constant amortized
 * operations. Parent and rank live in typed arrays indexed by element id
 * (for maze cells: y * width + x).
 *
 * @example
 * ```typescript
 * const uf = new UnionFind(4);
 * uf.union(0, 1);      // true
 * uf.union(1, 0);      // false, already joined
 * uf.connected(0, 1);  // true
 * uf.setCount;         // 3
 * ```
 */
export class UnionFind {
  private readonly parent: Uint32Array;
  private readonly rank: Uint8Array;
  private sets: number;

  /**
   * @param size - Number of elements (ids 0 to size-1)
   */
  constructor(size: number) {
    this.parent = new Uint32Array(size);
    this.rank = new Uint8Array(size);
    for (let i = 0; i < size; i++) {
      this.parent[i] = i;
    }
    this.sets = size;
  }

  get size(): number {
    return this.parent.length;
  }

  /** Number of disjoint sets remaining. */
  get setCount(): number {
    return this.sets;
  }

  /**
   * Root of the set containing x. Ids outside the structure are their own root.
   */
  find(x: number): number {
    if (x < 0 || x >= this.parent.length) return x;

    let root = x;
    let next = this.parent[root] ?? root;
    while (next !== root) {
      root = next;
      next = this.parent[root] ?? root;
    }

    // Path compression: point every node on the walk at the root
    let node = x;
    while (node !== root) {
      const up = this.parent[node] ?? root;
      this.parent[node] = root;
      node = up;
    }

    return root;
  }

  /**
   * Merge the sets containing x and y.
   * @returns True if a merge happened, false if they were already joined
   */
  union(x: number, y: number): boolean {
    if (x < 0 || x >= this.parent.length) return false;
    if (y < 0 || y >= this.parent.length) return false;

    const rootX = this.find(x);
    const rootY = this.find(y);
    if (rootX === rootY) return false;

    const rankX = this.rank[rootX] ?? 0;
    const rankY = this.rank[rootY] ?? 0;

    if (rankX < rankY) {
      this.parent[rootX] = rootY;
    } else if (rankX > rankY) {
      this.parent[rootY] = rootX;
    } else {
      this.parent[rootY] = rootX;
      this.rank[rootX] = rankX + 1;
    }

    this.sets--;
    return true;
  }

  connected(x: number, y: number): boolean {
    return this.find(x) === this.find(y);
  }
}
