import type { TreeNode } from '../engine/tree-node';

/**
 * Supplies the icon, label and style token of a rendered line. The style
 * token is opaque to the engine; `paint` turns text plus token into the
 * final string and defaults to returning the text unchanged.
 */
export interface TreeRenderProvider<T> {
  getIcon(node: TreeNode<T>): string;
  format(node: TreeNode<T>): string;
  getStyle(node: TreeNode<T>, focused: boolean): string;
  paint?(text: string, style: string): string;
}

export type TreeSearchPredicate<T> = (
  node: TreeNode<T>,
  term: string,
  signal?: AbortSignal,
) => boolean;

/**
 * Picks the next focus target among the visible nodes, or null when there is
 * nothing to move to.
 */
export type TreeFocusPolicy<T> = (
  visible: readonly TreeNode<T>[],
  current: TreeNode<T> | null,
  offset: number,
  signal?: AbortSignal,
) => TreeNode<T> | null;

export type TreeItemFilter<T> = (data: T) => boolean;

export type TreeExpandPolicy<T> = (node: TreeNode<T>) => boolean;

export type TreeProgressHandler<T> = (processed: number, node: TreeNode<T>) => void;
