/**
 * Disjoint sets over string ids. The representative of a set is always its
 * lexicographically smallest member, so the result does not depend on the
 * order unions happen in.
 */
export class UnionFind {
  private readonly parents = new Map<string, string>();

  add(id: string): void {
    if (!this.parents.has(id)) {
      this.parents.set(id, id);
    }
  }

  has(id: string): boolean {
    return this.parents.has(id);
  }

  find(id: string): string {
    let root = id;
    let next = this.parents.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parents.get(root);
    }
    if (next === undefined) {
      throw new Error(`Unknown union-find element '${id}'`);
    }

    // Path compression
    let current = id;
    while (current !== root) {
      const parent = this.parents.get(current) ?? root;
      this.parents.set(current, root);
      current = parent;
    }

    return root;
  }

  /**
   * Merges the sets of `a` and `b` and returns the surviving representative.
   */
  union(a: string, b: string): string {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) {
      return rootA;
    }

    if (rootA < rootB) {
      this.parents.set(rootB, rootA);
      return rootA;
    }
    this.parents.set(rootA, rootB);
    return rootB;
  }

  /**
   * Members grouped by representative, each group sorted.
   */
  groups(): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    for (const id of [...this.parents.keys()].sort()) {
      const root = this.find(id);
      const members = groups.get(root);
      if (members === undefined) {
        groups.set(root, [id]);
      } else {
        members.push(id);
      }
    }
    return groups;
  }
}
