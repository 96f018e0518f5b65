/**
 * Two-colour disjoint set: every key belongs to a component, and within a
 * component to one of two halves. Keys linked with `separate` end up in
 * opposite halves of the same component.
 *
 * Links are applied in call order. A link that contradicts an earlier one is
 * rejected, so the first placement of a key is the one that sticks.
 */

export interface SideRoot {
  /** Representative key of the component */
  root: string;
  /** Whether the key sits in the opposite half from the root */
  opposite: boolean;
}

export class SideDisjointSet {
  private readonly parent = new Map<string, string>();
  private readonly oppositeOfParent = new Map<string, boolean>();
  private readonly rank = new Map<string, number>();

  add(key: string): void {
    if (this.parent.has(key)) return;
    this.parent.set(key, key);
    this.oppositeOfParent.set(key, false);
    this.rank.set(key, 0);
  }

  find(key: string): SideRoot {
    const parent = this.parent.get(key);
    if (parent === undefined) {
      throw new Error(`Unknown side key: ${key}`);
    }
    if (parent === key) {
      return { root: key, opposite: false };
    }

    const up = this.find(parent);
    const opposite = (this.oppositeOfParent.get(key) ?? false) !== up.opposite;

    // Path compression
    this.parent.set(key, up.root);
    this.oppositeOfParent.set(key, opposite);

    return { root: up.root, opposite };
  }

  /**
   * Place `a` and `b` on opposite halves.
   * Returns false (and changes nothing) when they are already on the same half.
   */
  separate(a: string, b: string): boolean {
    this.add(a);
    this.add(b);

    const left = this.find(a);
    const right = this.find(b);

    if (left.root === right.root) {
      return left.opposite !== right.opposite;
    }

    // Offset of the attached root so that a and b end up on opposite halves
    const offset = left.opposite === right.opposite;
    const leftRank = this.rank.get(left.root) ?? 0;
    const rightRank = this.rank.get(right.root) ?? 0;

    if (leftRank < rightRank) {
      this.attach(left.root, right.root, offset);
    } else {
      this.attach(right.root, left.root, offset);
      if (leftRank === rightRank) {
        this.rank.set(left.root, leftRank + 1);
      }
    }

    return true;
  }

  private attach(child: string, root: string, opposite: boolean): void {
    this.parent.set(child, root);
    this.oppositeOfParent.set(child, opposite);
  }
}
