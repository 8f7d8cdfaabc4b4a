import type { TreeNode } from '../engine/tree-node';

export interface RenderedLine<T> {
  node: TreeNode<T>;
  /** Position in visible order. */
  index: number;
  depth: number;
  isLast: boolean;
  focused: boolean;
  style: string;
  /** Line before painting. */
  plain: string;
  text: string;
}

export interface TreeRenderResult<T> {
  lines: RenderedLine<T>[];
  /** Painted lines joined with newlines. */
  text: string;
  totalLines: number;
  offset: number;
}
