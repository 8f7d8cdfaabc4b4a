import { Tree } from '../engine/tree';
import { TreeNode } from '../engine/tree-node';
import { resolveTreeConfig, TreeConfig } from '../types/tree-config';
import { BuildPolicy } from './build-policy';
import { applyExpansion, filterNodes, limitDepth } from './tree-transforms';

export interface TreeBuildResult<T> {
  /** Always usable; empty or partial when `error` is set. */
  tree: Tree<T>;
  error?: unknown;
}

/** Wraps built roots in a tree and hands any error to `onError`. */
export function finishBuild<T>(
  roots: readonly TreeNode<T>[],
  config: TreeConfig<T>,
  error?: unknown,
): TreeBuildResult<T> {
  const tree = new Tree(roots, config);
  if (error === undefined) {
    return { tree };
  }

  config.onError?.(error);
  return { tree, error };
}

/**
 * Wraps nodes that were built by hand. Filtering and depth limiting work on
 * copies; the traversal cap and progress reporting do not apply here.
 */
export function createTree<T>(nodes: readonly TreeNode<T>[], config: TreeConfig<T> = {}): Tree<T> {
  const policy = new BuildPolicy(resolveTreeConfig(config));
  let roots = [...nodes];

  const { filter } = policy.config;
  if (filter) {
    roots = filterNodes(roots, filter);
  }
  if (policy.config.maxDepth >= 0) {
    roots = limitDepth(roots, policy.config.maxDepth);
  }
  if (policy.config.expand || policy.config.expandAll) {
    applyExpansion(roots, (node) => policy.applyExpansion(node));
  }

  return new Tree(roots, policy.config);
}
