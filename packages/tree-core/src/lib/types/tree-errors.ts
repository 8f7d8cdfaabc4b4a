import { TreeId } from './tree-node';

export type TreeErrorReason =
  | 'empty-id'
  | 'cyclic-reference'
  | 'parent-not-found'
  | 'traversal-limit'
  | 'node-not-found'
  | 'file-system'
  | 'path-resolution'
  | 'directory-scan';

export interface TreeErrorDetails {
  nodeId?: TreeId;
  parentId?: TreeId;
  path?: string;
  cause?: unknown;
}

const BASE_MESSAGES: Record<TreeErrorReason, string> = {
  'empty-id': 'empty node ID',
  'cyclic-reference': 'cyclic reference detected in tree',
  'parent-not-found': 'parent node not found',
  'traversal-limit': 'traversal limit exceeded',
  'node-not-found': 'node not found in tree',
  'file-system': 'file system operation failed',
  'path-resolution': 'path resolution failed',
  'directory-scan': 'directory scan failed',
};

/**
 * Every failure the engine raises on its own. Cancellation is never wrapped:
 * an aborted signal surfaces its `reason` as-is.
 *
 * `traversal-limit` is soft: builders return it next to a usable partial tree.
 */
export class TreeError extends Error {
  readonly reason: TreeErrorReason;
  readonly nodeId?: TreeId;
  readonly parentId?: TreeId;
  readonly path?: string;

  constructor(reason: TreeErrorReason, details: TreeErrorDetails = {}) {
    super(
      messageFor(reason, details),
      details.cause === undefined ? undefined : { cause: details.cause },
    );
    this.name = 'TreeError';
    this.reason = reason;
    this.nodeId = details.nodeId;
    this.parentId = details.parentId;
    this.path = details.path;
  }
}

function messageFor(reason: TreeErrorReason, details: TreeErrorDetails): string {
  const base = BASE_MESSAGES[reason];

  if (reason === 'cyclic-reference' && details.nodeId !== undefined) {
    return `${base}: node "${details.nodeId}" -> parent "${details.parentId ?? ''}"`;
  }
  if (reason === 'parent-not-found' && details.nodeId !== undefined) {
    return `${base}: parent id "${details.parentId ?? ''}" not found for node "${details.nodeId}"`;
  }
  if (reason === 'node-not-found' && details.nodeId !== undefined) {
    return `${base}: ${details.nodeId}`;
  }
  if (details.path === undefined) {
    return base;
  }

  const cause = details.cause === undefined ? '' : `: ${formatTreeError(details.cause)}`;
  return `${base}: ${details.path}${cause}`;
}

export function isTreeError(error: unknown, reason?: TreeErrorReason): error is TreeError {
  if (!(error instanceof TreeError)) {
    return false;
  }
  return reason === undefined || error.reason === reason;
}

/** One-line description suitable for a status bar. */
export function formatTreeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
