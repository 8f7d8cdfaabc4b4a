import { TreeNode } from '../engine/tree-node';
import { FlatDataAdapter } from '../types/tree-adapter';
import { resolveTreeConfig, TreeConfig } from '../types/tree-config';
import { TreeError } from '../types/tree-errors';
import { TreeId } from '../types/tree-node';
import { BuildPolicy } from './build-policy';
import { finishBuild, TreeBuildResult } from './create-tree';
import { limitDepth } from './tree-transforms';

/**
 * True when linking `childId` under `parentId` would close a loop, judged by
 * walking the recorded parent chain upwards from `parentId`.
 */
export function detectCycle(
  childId: TreeId,
  parentId: TreeId,
  parentOf: ReadonlyMap<TreeId, TreeId>,
): boolean {
  const visited = new Set<TreeId>();
  let current = parentId;
  while (current !== '') {
    if (current === childId || visited.has(current)) {
      return true;
    }
    visited.add(current);
    current = parentOf.get(current) ?? '';
  }
  return false;
}

/**
 * Builds a tree from records that point at their parent id; an empty parent
 * id marks a root. Roots and siblings keep input order.
 *
 * A filtered item drops out with all of its descendants. When the cap stops
 * the scan, items whose parent was never reached are dropped as well and the
 * wired roots come back with a `traversal-limit` error.
 */
export async function createTreeFromFlatData<TSource>(
  items: readonly TSource[],
  adapter: FlatDataAdapter<TSource>,
  config: TreeConfig<TSource> = {},
): Promise<TreeBuildResult<TSource>> {
  const policy = new BuildPolicy(resolveTreeConfig(config));

  try {
    let roots = assemble(items, adapter, policy);
    if (policy.config.maxDepth >= 0) {
      roots = limitDepth(roots, policy.config.maxDepth);
    }
    const error = policy.capHit ? new TreeError('traversal-limit') : undefined;
    return finishBuild(roots, policy.config, error);
  } catch (error) {
    return finishBuild([], policy.config, error);
  }
}

function assemble<TSource>(
  items: readonly TSource[],
  adapter: FlatDataAdapter<TSource>,
  policy: BuildPolicy<TSource>,
): TreeNode<TSource>[] {
  const nodes = new Map<TreeId, TreeNode<TSource>>();
  const parentOf = new Map<TreeId, TreeId>();
  const filtered = new Set<TreeId>();
  const unscanned = new Set<TreeId>();

  for (const item of items) {
    if (policy.capHit) {
      unscanned.add(adapter.getId(item));
      continue;
    }

    policy.checkSignal();
    if (policy.shouldSkip(item)) {
      filtered.add(adapter.getId(item));
      continue;
    }
    if (policy.isAtCap()) {
      policy.capHit = true;
      unscanned.add(adapter.getId(item));
      continue;
    }

    const id = adapter.getId(item);
    if (id === '') {
      throw new TreeError('empty-id');
    }

    const node = new TreeNode(id, adapter.getLabel(item), item);
    nodes.set(id, node);
    parentOf.set(id, adapter.getParentId(item));
    policy.record(node);
  }

  const roots: TreeNode<TSource>[] = [];
  for (const [id, node] of nodes) {
    policy.checkSignal();
    policy.applyExpansion(node);

    const parentId = parentOf.get(id) ?? '';
    if (parentId === '') {
      roots.push(node);
      continue;
    }

    if (detectCycle(id, parentId, parentOf)) {
      throw new TreeError('cyclic-reference', { nodeId: id, parentId });
    }

    const parent = nodes.get(parentId);
    if (parent) {
      parent.addChild(node);
    } else if (!filtered.has(parentId) && !unscanned.has(parentId)) {
      throw new TreeError('parent-not-found', { nodeId: id, parentId });
    }
  }

  return roots;
}
