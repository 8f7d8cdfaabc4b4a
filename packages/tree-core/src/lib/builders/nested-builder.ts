import { TreeNode } from '../engine/tree-node';
import { NestedDataAdapter } from '../types/tree-adapter';
import { resolveTreeConfig, TreeConfig } from '../types/tree-config';
import { TreeError } from '../types/tree-errors';
import { resolveChildren } from '../utils/resolve-children';
import { BuildPolicy } from './build-policy';
import { finishBuild, TreeBuildResult } from './create-tree';

/**
 * Builds a tree from records that carry their own children. Items are
 * visited pre-order; a filtered item takes its whole subtree with it.
 *
 * When the traversal cap stops the walk the roots built so far come back
 * with a `traversal-limit` error. Any other failure yields an empty tree.
 */
export async function createTreeFromNestedData<TSource>(
  items: readonly TSource[],
  adapter: NestedDataAdapter<TSource>,
  config: TreeConfig<TSource> = {},
): Promise<TreeBuildResult<TSource>> {
  const policy = new BuildPolicy(resolveTreeConfig(config));

  try {
    const roots: TreeNode<TSource>[] = [];
    for (const item of items) {
      const root = await buildSubtree(item, 0, adapter, policy);
      if (root) {
        roots.push(root);
      }
      if (policy.capHit) {
        return finishBuild(roots, policy.config, new TreeError('traversal-limit'));
      }
    }
    return finishBuild(roots, policy.config);
  } catch (error) {
    return finishBuild([], policy.config, error);
  }
}

async function buildSubtree<TSource>(
  item: TSource,
  depth: number,
  adapter: NestedDataAdapter<TSource>,
  policy: BuildPolicy<TSource>,
): Promise<TreeNode<TSource> | null> {
  policy.checkSignal();
  if (policy.shouldSkip(item)) {
    return null;
  }
  if (policy.isAtCap()) {
    policy.capHit = true;
    return null;
  }

  const id = adapter.getId(item);
  if (id === '') {
    throw new TreeError('empty-id');
  }

  const node = new TreeNode(id, adapter.getLabel(item), item);
  policy.record(node);

  if (policy.isAtDepthLimit(depth)) {
    policy.applyExpansion(node);
    return node;
  }

  const children = await resolveChildren(adapter.getChildren(item));
  for (const childItem of children) {
    const child = await buildSubtree(childItem, depth + 1, adapter, policy);
    node.addChild(child);
    if (policy.capHit) {
      break;
    }
  }

  policy.applyExpansion(node);
  return node;
}
