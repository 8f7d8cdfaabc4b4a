import type { TreeNode } from '../engine/tree-node';

export type TreeId = string;

/** Position metadata attached to every node a cursor yields. */
export interface TreeNodeInfo<T> {
  node: TreeNode<T>;
  depth: number;
  /** Last among its siblings in the order that produced it. */
  isLast: boolean;
}

export interface TreeStats {
  total: number;
  visible: number;
  expanded: number;
  focused: number;
  maxDepth: number;
}

export interface TreeSearchResult<T> {
  /** Matches in depth-first order; partial when `error` is set. */
  matches: TreeNode<T>[];
  /** Abort reason when the search was cancelled midway. */
  error?: unknown;
}
