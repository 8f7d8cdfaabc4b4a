import type { TreeNode } from './tree-node';
import { TreeNodeInfo } from '../types/tree-node';

export interface CursorOptions {
  /** When false, collapsed nodes are yielded but not descended into. */
  followCollapsed?: boolean;
  signal?: AbortSignal;
}

function rootFrames<T>(roots: readonly TreeNode<T>[]): TreeNodeInfo<T>[] {
  return roots.map((node, index) => ({
    node,
    depth: 0,
    isLast: index === roots.length - 1,
  }));
}

function childFrames<T>(parent: TreeNodeInfo<T>): TreeNodeInfo<T>[] {
  const children = parent.node.children;
  return children.map((node, index) => ({
    node,
    depth: parent.depth + 1,
    isLast: index === children.length - 1,
  }));
}

/**
 * Lazy traversal over a node forest. The signal is checked before each
 * element; once aborted, `next()` throws the abort reason and the cursor is
 * finished from then on.
 */
abstract class TreeCursor<T> implements IterableIterator<TreeNodeInfo<T>> {
  private finished = false;

  protected constructor(protected readonly signal?: AbortSignal) {}

  protected abstract hasPending(): boolean;

  protected abstract advance(): TreeNodeInfo<T>;

  next(): IteratorResult<TreeNodeInfo<T>> {
    if (this.finished || !this.hasPending()) {
      this.finished = true;
      return { done: true, value: undefined };
    }
    if (this.signal?.aborted) {
      this.finished = true;
      throw this.signal.reason;
    }
    return { done: false, value: this.advance() };
  }

  return(): IteratorResult<TreeNodeInfo<T>> {
    this.finished = true;
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }

  /** Drains the cursor into an array. */
  toArray(): TreeNodeInfo<T>[] {
    return Array.from(this);
  }
}

/** Pre-order: a node, then each child subtree left to right. */
export class DepthFirstCursor<T> extends TreeCursor<T> {
  private readonly stack: TreeNodeInfo<T>[];
  private readonly followCollapsed: boolean;

  constructor(roots: readonly TreeNode<T>[], options: CursorOptions = {}) {
    super(options.signal);
    this.followCollapsed = options.followCollapsed ?? true;
    this.stack = rootFrames(roots).reverse();
  }

  protected hasPending(): boolean {
    return this.stack.length > 0;
  }

  protected advance(): TreeNodeInfo<T> {
    const frame = this.stack.pop();
    if (!frame) {
      throw new RangeError('cursor advanced past its end');
    }
    if (frame.node.hasChildren && (this.followCollapsed || frame.node.expanded)) {
      const children = childFrames(frame);
      for (let i = children.length - 1; i >= 0; i -= 1) {
        this.stack.push(children[i]);
      }
    }
    return frame;
  }
}

/** Level by level, siblings left to right. */
export class BreadthFirstCursor<T> extends TreeCursor<T> {
  private readonly queue: TreeNodeInfo<T>[];
  private head = 0;
  private readonly followCollapsed: boolean;

  constructor(roots: readonly TreeNode<T>[], options: CursorOptions = {}) {
    super(options.signal);
    this.followCollapsed = options.followCollapsed ?? true;
    this.queue = rootFrames(roots);
  }

  protected hasPending(): boolean {
    return this.head < this.queue.length;
  }

  protected advance(): TreeNodeInfo<T> {
    const frame = this.queue[this.head];
    this.head += 1;
    if (frame.node.hasChildren && (this.followCollapsed || frame.node.expanded)) {
      this.queue.push(...childFrames(frame));
    }
    // Drop the consumed prefix once it dominates the buffer.
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }
    return frame;
  }
}

interface PostOrderFrame<T> {
  info: TreeNodeInfo<T>;
  expanded: boolean;
}

/** Children before their parent; leaves come first. */
export class PostOrderCursor<T> extends TreeCursor<T> {
  private readonly stack: PostOrderFrame<T>[];
  private readonly followCollapsed: boolean;

  constructor(roots: readonly TreeNode<T>[], options: CursorOptions = {}) {
    super(options.signal);
    this.followCollapsed = options.followCollapsed ?? true;
    this.stack = rootFrames(roots)
      .reverse()
      .map((info) => ({ info, expanded: false }));
  }

  protected hasPending(): boolean {
    return this.stack.length > 0;
  }

  protected advance(): TreeNodeInfo<T> {
    for (;;) {
      const top = this.stack[this.stack.length - 1];
      const descend =
        !top.expanded &&
        top.info.node.hasChildren &&
        (this.followCollapsed || top.info.node.expanded);

      if (!descend) {
        this.stack.pop();
        return top.info;
      }

      top.expanded = true;
      const children = childFrames(top.info);
      for (let i = children.length - 1; i >= 0; i -= 1) {
        this.stack.push({ info: children[i], expanded: false });
      }
    }
  }
}

/**
 * Yields only the frames of `source` whose node passes `predicate`. Frame
 * metadata is left as the source produced it.
 */
export class FilteredCursor<T> implements IterableIterator<TreeNodeInfo<T>> {
  constructor(
    private readonly source: Iterator<TreeNodeInfo<T>>,
    private readonly predicate: (node: TreeNode<T>) => boolean,
  ) {}

  next(): IteratorResult<TreeNodeInfo<T>> {
    for (;;) {
      const result = this.source.next();
      if (result.done || this.predicate(result.value.node)) {
        return result;
      }
    }
  }

  return(): IteratorResult<TreeNodeInfo<T>> {
    this.source.return?.();
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }

  toArray(): TreeNodeInfo<T>[] {
    return Array.from(this);
  }
}

/**
 * Display order: depth-first, descending only into expanded nodes, keeping
 * nodes whose `visible` flag is set.
 */
export class VisibleCursor<T> extends FilteredCursor<T> {
  constructor(roots: readonly TreeNode<T>[], signal?: AbortSignal) {
    super(
      new DepthFirstCursor(roots, { followCollapsed: false, signal }),
      (node) => node.visible,
    );
  }
}
