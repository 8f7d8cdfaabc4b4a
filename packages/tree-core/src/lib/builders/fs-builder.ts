import { readdir } from 'node:fs/promises';
import { join } from 'node:path';

import { TreeNode } from '../engine/tree-node';
import { FileInfo } from '../types/file-info';
import { FileSystemTreeConfig, resolveTreeConfig } from '../types/tree-config';
import { isTreeError, TreeError } from '../types/tree-errors';
import { resolvePath, safeStat } from '../utils/filesystem';
import { BuildPolicy } from './build-policy';
import { finishBuild, TreeBuildResult } from './create-tree';

interface WalkState {
  policy: BuildPolicy<FileInfo>;
  followSymlinks: boolean;
  visited: Set<string>;
}

/**
 * Walks the filesystem from `path`. Node ids are absolute paths and each
 * node carries a `FileInfo`. Entries are read in name order.
 *
 * Hitting the traversal cap returns what was attached so far together with
 * a `traversal-limit` error; every other failure yields an empty tree.
 */
export async function createTreeFromFileSystem(
  path: string,
  config: FileSystemTreeConfig<FileInfo> = {},
): Promise<TreeBuildResult<FileInfo>> {
  const policy = new BuildPolicy(resolveTreeConfig(config));
  const state: WalkState = {
    policy,
    followSymlinks: config.followSymlinks ?? false,
    visited: new Set(),
  };

  let root: TreeNode<FileInfo> | null = null;
  try {
    root = await createRoot(path, state);
    if (root.data.isDirectory && !policy.isAtDepthLimit(0)) {
      await scanDirectory(root, 0, state);
    }
    return finishBuild([root], policy.config);
  } catch (error) {
    if (root && isTreeError(error, 'traversal-limit')) {
      return finishBuild([root], policy.config, error);
    }
    return finishBuild([], policy.config, error);
  }
}

async function createRoot(path: string, state: WalkState): Promise<TreeNode<FileInfo>> {
  let absolute: string;
  try {
    absolute = resolvePath(path);
  } catch (cause) {
    throw new TreeError('path-resolution', { path, cause });
  }

  const info = await statEntry(absolute, state);
  const root = new TreeNode(absolute, info.name, info);
  state.policy.applyExpansion(root);
  state.policy.record(root);
  return root;
}

async function statEntry(path: string, state: WalkState): Promise<FileInfo> {
  try {
    return await safeStat(path, state.followSymlinks, state.visited);
  } catch (cause) {
    throw new TreeError('file-system', { path, cause });
  }
}

async function readEntries(path: string): Promise<string[]> {
  try {
    const names = await readdir(path);
    return names.sort();
  } catch (cause) {
    throw new TreeError('directory-scan', { path, cause });
  }
}

/**
 * Children are attached in one batch when the directory is done, or when
 * the walk is interrupted, so a partial result keeps every scanned entry.
 */
async function scanDirectory(
  parent: TreeNode<FileInfo>,
  depth: number,
  state: WalkState,
): Promise<void> {
  const { policy } = state;
  const entries = await readEntries(parent.data.path);
  const children: TreeNode<FileInfo>[] = [];

  try {
    for (const entry of entries) {
      policy.checkSignal();

      const childPath = join(parent.data.path, entry);
      const info = await statEntry(childPath, state);
      if (policy.shouldSkip(info)) {
        continue;
      }
      if (policy.isAtCap()) {
        policy.capHit = true;
        throw new TreeError('traversal-limit', { path: childPath });
      }

      const child = new TreeNode(childPath, info.name, info);
      policy.applyExpansion(child);
      policy.record(child);
      children.push(child);

      if (info.isDirectory && !policy.isAtDepthLimit(depth + 1)) {
        await scanDirectory(child, depth + 1, state);
      }
    }
  } finally {
    if (children.length > 0) {
      parent.setChildren(children);
    }
  }
}
