/**
 * Union-Find Clustering
 *
 * Closes a pairwise, possibly non-transitive relation into equivalence
 * classes. With abbreviation matching "ACM" ~ "Assoc. Comput. Mach." and
 * "Assoc. Comput. Mach." ~ "Association for Computing Machinery" put all
 * three in one class even when the ends are not directly related.
 */

export class UnionFind {
  private readonly parent: number[];
  private readonly rank: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, index) => index);
    this.rank = new Array<number>(size).fill(0);
  }

  get size(): number {
    return this.parent.length;
  }

  find(index: number): number {
    let root = index;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }
    // path compression
    let current = index;
    while (this.parent[current] !== root) {
      const next = this.parent[current];
      this.parent[current] = root;
      current = next;
    }
    return root;
  }

  union(a: number, b: number): boolean {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return false;

    if (this.rank[rootA] < this.rank[rootB]) {
      this.parent[rootA] = rootB;
    } else if (this.rank[rootA] > this.rank[rootB]) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootB] = rootA;
      this.rank[rootA]++;
    }
    return true;
  }

  connected(a: number, b: number): boolean {
    return this.find(a) === this.find(b);
  }
}

/**
 * Partition items into classes of the transitive closure of `same`
 *
 * Classes are ordered by their first member; members keep input order.
 */
export function clusterValues<T>(items: readonly T[], same: (a: T, b: T) => boolean): T[][] {
  const sets = new UnionFind(items.length);
  for (let i = 0; i < items.length; i++) {
    for (let j = i + 1; j < items.length; j++) {
      if (!sets.connected(i, j) && same(items[i], items[j])) {
        sets.union(i, j);
      }
    }
  }

  const classes = new Map<number, T[]>();
  items.forEach((item, index) => {
    const root = sets.find(index);
    const members = classes.get(root);
    if (members === undefined) {
      classes.set(root, [item]);
    } else {
      members.push(item);
    }
  });
  return [...classes.values()];
}
