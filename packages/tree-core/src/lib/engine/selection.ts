import type { TreeNode } from './tree-node';

/**
 * Linear movement over the visible list with wraparound at both ends. With
 * no usable current focus, a forward move lands on the first node and any
 * other move on the last.
 */
export function defaultFocusPolicy<T>(
  visible: readonly TreeNode<T>[],
  current: TreeNode<T> | null,
  offset: number,
  signal?: AbortSignal,
): TreeNode<T> | null {
  signal?.throwIfAborted();
  if (visible.length === 0) {
    return null;
  }

  const index = current ? visible.indexOf(current) : -1;
  if (index === -1) {
    return offset > 0 ? visible[0] : visible[visible.length - 1];
  }

  let next = index + offset;
  if (next < 0) {
    next = visible.length - 1;
  } else if (next >= visible.length) {
    next = 0;
  }
  return visible[next];
}

/**
 * Inclusive slice of `visible` between two nodes, in display order whichever
 * comes first. Empty when either end is not in the list.
 */
export function selectVisibleRange<T>(
  from: TreeNode<T>,
  to: TreeNode<T>,
  visible: readonly TreeNode<T>[],
): TreeNode<T>[] {
  const startIndex = visible.indexOf(from);
  const endIndex = visible.indexOf(to);

  if (startIndex === -1 || endIndex === -1) {
    return [];
  }

  const [fromIndex, toIndex] =
    startIndex <= endIndex ? [startIndex, endIndex] : [endIndex, startIndex];

  return visible.slice(fromIndex, toIndex + 1);
}

/** Ordered focus list with a mirrored id set; the first entry is primary. */
export class FocusSet<T> {
  private ordered: TreeNode<T>[] = [];
  private readonly ids = new Set<string>();

  get size(): number {
    return this.ordered.length;
  }

  get primary(): TreeNode<T> | null {
    return this.ordered.length > 0 ? this.ordered[0] : null;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  nodes(): TreeNode<T>[] {
    return [...this.ordered];
  }

  idList(): string[] {
    return this.ordered.map((node) => node.id);
  }

  /** True when the set holds exactly this node and nothing else. */
  isSole(node: TreeNode<T>): boolean {
    return this.ordered.length === 1 && this.ordered[0] === node;
  }

  replace(nodes: readonly TreeNode<T>[]): void {
    this.ordered = [];
    this.ids.clear();
    for (const node of nodes) {
      this.add(node);
    }
  }

  add(node: TreeNode<T>): boolean {
    if (this.ids.has(node.id)) {
      return false;
    }
    this.ordered.push(node);
    this.ids.add(node.id);
    return true;
  }

  remove(id: string): boolean {
    if (!this.ids.delete(id)) {
      return false;
    }
    this.ordered = this.ordered.filter((node) => node.id !== id);
    return true;
  }

  /** Moves an already focused node to the primary slot. */
  promote(node: TreeNode<T>): void {
    const index = this.ordered.indexOf(node);
    if (index <= 0) {
      return;
    }
    this.ordered.splice(index, 1);
    this.ordered.unshift(node);
  }

  clear(): boolean {
    const changed = this.ordered.length > 0;
    this.ordered = [];
    this.ids.clear();
    return changed;
  }
}
