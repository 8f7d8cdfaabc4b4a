import type { TreeNode } from './tree-node';

function payloadText(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }
  if (typeof data === 'number' || typeof data === 'bigint' || typeof data === 'boolean') {
    return String(data);
  }
  if (typeof data === 'object' && data !== null && 'toString' in data) {
    // Only payloads that describe themselves take part.
    const describe: unknown = data.toString;
    if (typeof describe === 'function' && describe !== Object.prototype.toString) {
      return String(data);
    }
  }
  return '';
}

/**
 * Case-insensitive substring match against the id, the name and a payload
 * that is a string or carries its own `toString`.
 */
export function defaultSearchPredicate<T>(node: TreeNode<T>, term: string): boolean {
  if (term === '') {
    return false;
  }

  const needle = term.toLowerCase();
  const fields = [node.id, node.name, payloadText(node.data)];
  return fields.some((field) => field.toLowerCase().includes(needle));
}

/** Expands and shows `node` and every ancestor above it. */
export function revealPath<T>(node: TreeNode<T>): void {
  let current: TreeNode<T> | null = node;
  while (current) {
    current.expand();
    current.setVisible(true);
    current = current.parent;
  }
}

/** Ids of every ancestor, closest to the root first. */
export function getAncestorIds<T>(node: TreeNode<T>): string[] {
  const ids: string[] = [];
  let current = node.parent;
  while (current) {
    ids.unshift(current.id);
    current = current.parent;
  }
  return ids;
}
