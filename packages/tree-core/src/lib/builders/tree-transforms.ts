import { TreeNode } from '../engine/tree-node';

/**
 * Copies the forest keeping nodes whose data passes `filter`, plus every
 * ancestor of such a node so the structure stays connected.
 */
export function filterNodes<T>(
  nodes: readonly TreeNode<T>[],
  filter: (data: T) => boolean,
): TreeNode<T>[] {
  const kept: TreeNode<T>[] = [];
  for (const node of nodes) {
    const children = filterNodes(node.children, filter);
    if (filter(node.data) || children.length > 0) {
      const copy = TreeNode.clone(node);
      copy.setChildren(children);
      kept.push(copy);
    }
  }
  return kept;
}

/**
 * Copies the forest down to `maxDepth` (roots are depth 0). The input is
 * never modified.
 */
export function limitDepth<T>(
  nodes: readonly TreeNode<T>[],
  maxDepth: number,
  depth = 0,
): TreeNode<T>[] {
  return nodes.map((node) => {
    const copy = TreeNode.clone(node);
    if (depth < maxDepth) {
      copy.setChildren(limitDepth(node.children, maxDepth, depth + 1));
    }
    return copy;
  });
}

export function applyExpansion<T>(
  nodes: readonly TreeNode<T>[],
  expand: (node: TreeNode<T>) => void,
): void {
  for (const node of nodes) {
    expand(node);
    applyExpansion(node.children, expand);
  }
}
