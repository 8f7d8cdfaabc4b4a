import type { TreeNode } from '../engine/tree-node';
import {
  TreeExpandPolicy,
  TreeFocusPolicy,
  TreeItemFilter,
  TreeProgressHandler,
  TreeRenderProvider,
  TreeSearchPredicate,
} from './tree-provider';

export interface TreeConfig<T> {
  /** Items rejected here are dropped together with their subtree. */
  filter?: TreeItemFilter<T>;
  /** Deepest level kept, roots being 0. Negative means unlimited. */
  maxDepth?: number;
  /** Most nodes a builder creates. Zero or less means unlimited. */
  traversalCap?: number;
  /** Decides whether a freshly built node starts expanded. */
  expand?: TreeExpandPolicy<T>;
  /** Shorthand for an expand policy that always says yes. */
  expandAll?: boolean;
  onProgress?: TreeProgressHandler<T>;
  /** Receives every error a builder returns. */
  onError?: (error: unknown) => void;
  signal?: AbortSignal;
  searchPredicate?: TreeSearchPredicate<T>;
  focusPolicy?: TreeFocusPolicy<T>;
  renderProvider?: TreeRenderProvider<T>;
  /** Display columns a rendered line may take. Zero disables truncation. */
  truncateWidth?: number;
}

export interface FileSystemTreeConfig<T> extends TreeConfig<T> {
  followSymlinks?: boolean;
}

export type TreeConfigDefaults = Required<
  Pick<TreeConfig<unknown>, 'maxDepth' | 'traversalCap' | 'truncateWidth' | 'expandAll'>
>;

export type ResolvedTreeConfig<T> = TreeConfig<T> & TreeConfigDefaults;

export const DEFAULT_TREE_CONFIG: Readonly<TreeConfigDefaults> = Object.freeze({
  maxDepth: -1,
  traversalCap: 10000,
  truncateWidth: 0,
  expandAll: false,
});

export function resolveTreeConfig<T>(config: TreeConfig<T> = {}): ResolvedTreeConfig<T> {
  return {
    ...config,
    maxDepth: config.maxDepth ?? DEFAULT_TREE_CONFIG.maxDepth,
    traversalCap: config.traversalCap ?? DEFAULT_TREE_CONFIG.traversalCap,
    truncateWidth: config.truncateWidth ?? DEFAULT_TREE_CONFIG.truncateWidth,
    expandAll: config.expandAll ?? DEFAULT_TREE_CONFIG.expandAll,
  };
}

/** Combined expand decision: `expandAll` wins over the policy. */
export function shouldExpand<T>(config: TreeConfig<T>, node: TreeNode<T>): boolean {
  if (config.expandAll) {
    return true;
  }
  return config.expand ? config.expand(node) : false;
}
