import type { TreeNode } from '../engine/tree-node';
import { ResolvedTreeConfig, shouldExpand } from '../types/tree-config';

/**
 * Per-build bookkeeping shared by every builder: the node counter, the cap
 * and depth checks, filtering, expansion and progress reporting.
 */
export class BuildPolicy<T> {
  private processed = 0;
  /** Set once the cap stopped the build. */
  capHit = false;

  constructor(readonly config: ResolvedTreeConfig<T>) {}

  get count(): number {
    return this.processed;
  }

  checkSignal(): void {
    this.config.signal?.throwIfAborted();
  }

  shouldSkip(data: T): boolean {
    return this.config.filter ? !this.config.filter(data) : false;
  }

  isAtCap(): boolean {
    return this.config.traversalCap > 0 && this.processed >= this.config.traversalCap;
  }

  isAtDepthLimit(depth: number): boolean {
    return this.config.maxDepth >= 0 && depth >= this.config.maxDepth;
  }

  /** Counts a freshly created node and reports progress. */
  record(node: TreeNode<T>): void {
    this.processed += 1;
    this.config.onProgress?.(this.processed, node);
  }

  applyExpansion(node: TreeNode<T>): void {
    if (shouldExpand(this.config, node)) {
      node.expand();
    }
  }
}
