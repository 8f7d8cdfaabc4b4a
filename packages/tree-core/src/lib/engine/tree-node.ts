import { TreeId } from '../types/tree-node';
import { DepthFirstCursor } from './cursors';

/**
 * One cell of a tree. A node owns its children; `parent` is a plain
 * back-reference kept in sync by `addChild` and `setChildren`.
 *
 * Nodes start visible and collapsed.
 */
export class TreeNode<T> {
  private label: string;
  private childNodes: TreeNode<T>[] = [];
  private parentNode: TreeNode<T> | null = null;
  private expandedState = false;
  private visibleState = true;

  constructor(
    readonly id: TreeId,
    name: string,
    public data: T,
  ) {
    this.label = name;
  }

  /** Uses the same string as id and name. */
  static simple<T>(idAndName: TreeId, data: T): TreeNode<T> {
    return new TreeNode(idAndName, idAndName, data);
  }

  /**
   * Copies id, name, data and the expanded/visible flags. Children and
   * parent are not carried over.
   */
  static clone<T>(original: TreeNode<T>): TreeNode<T> {
    const copy = new TreeNode(original.id, original.label, original.data);
    copy.expandedState = original.expandedState;
    copy.visibleState = original.visibleState;
    return copy;
  }

  /** Display label; falls back to the id when no name was given. */
  get name(): string {
    return this.label === '' ? this.id : this.label;
  }

  setName(name: string): void {
    this.label = name;
  }

  setData(data: T): void {
    this.data = data;
  }

  get children(): readonly TreeNode<T>[] {
    return this.childNodes;
  }

  get parent(): TreeNode<T> | null {
    return this.parentNode;
  }

  get hasChildren(): boolean {
    return this.childNodes.length > 0;
  }

  get isRoot(): boolean {
    return this.parentNode === null;
  }

  get expanded(): boolean {
    return this.expandedState;
  }

  get visible(): boolean {
    return this.visibleState;
  }

  /** Number of ancestors above this node. */
  get depth(): number {
    let depth = 0;
    let current = this.parentNode;
    while (current) {
      depth += 1;
      current = current.parentNode;
    }
    return depth;
  }

  /** Ancestors from the root down to and including this node. */
  path(): TreeNode<T>[] {
    const path: TreeNode<T>[] = [];
    let current: TreeNode<T> | null = this;
    while (current) {
      path.unshift(current);
      current = current.parentNode;
    }
    return path;
  }

  addChild(child: TreeNode<T> | null | undefined): void {
    if (!child) {
      return;
    }
    child.parentNode = this;
    this.childNodes.push(child);
  }

  /**
   * Replaces the whole child list. Nodes dropped from the list lose their
   * back-reference; missing entries are skipped.
   */
  setChildren(children: readonly (TreeNode<T> | null | undefined)[]): void {
    const next: TreeNode<T>[] = [];
    for (const child of children) {
      if (child) {
        next.push(child);
      }
    }

    const kept = new Set(next);
    for (const previous of this.childNodes) {
      if (!kept.has(previous) && previous.parentNode === this) {
        previous.parentNode = null;
      }
    }
    for (const child of next) {
      child.parentNode = this;
    }
    this.childNodes = next;
  }

  expand(): void {
    this.expandedState = true;
  }

  collapse(): void {
    this.expandedState = false;
  }

  toggle(): void {
    this.expandedState = !this.expandedState;
  }

  setExpanded(expanded: boolean): void {
    this.expandedState = expanded;
  }

  setVisible(visible: boolean): void {
    this.visibleState = visible;
  }

  /** Depth-first walk of this subtree, collapsed branches included. */
  walk(signal?: AbortSignal): DepthFirstCursor<T> {
    return new DepthFirstCursor<T>([this], { followCollapsed: true, signal });
  }
}
