import type { BigIntStats } from 'node:fs';
import { lstat, realpath, stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import { basename, join, resolve } from 'node:path';

import { FileInfo } from '../types/file-info';

/** Expands a leading `~` and returns an absolute, normalised path. */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    return resolve(join(homedir(), path.slice(1)));
  }
  return resolve(path);
}

export type FileIdentity = Pick<BigIntStats, 'dev' | 'ino' | 'size' | 'mtimeMs'>;

/**
 * Identity of the file behind `stats`: device and inode where the platform
 * has them, otherwise name, size and modification time. Stats are read as
 * bigints so inode numbers above 2^53 stay distinct.
 */
export function identityKey(name: string, stats: FileIdentity, platform = process.platform): string {
  if (platform === 'win32') {
    return `name:${name}:${stats.size}:${stats.mtimeMs}`;
  }
  if (stats.ino === 0n) {
    return `fallback:${name}_${stats.mtimeMs}`;
  }
  return `dev:${stats.dev}_ino:${stats.ino}`;
}

export class SymlinkLoopError extends Error {
  constructor(readonly path: string) {
    super(`symlink loop detected at ${path}`);
    this.name = 'SymlinkLoopError';
  }
}

/**
 * Stats `path` without following links unless asked to. Each file identity
 * may be seen once per walk; a second sighting means a loop.
 */
export async function safeStat(
  path: string,
  followSymlinks: boolean,
  visited: Set<string>,
): Promise<FileInfo> {
  const linkStats = await lstat(path, { bigint: true });
  let stats = linkStats;
  if (followSymlinks && linkStats.isSymbolicLink()) {
    stats = await stat(await realpath(path), { bigint: true });
  }

  const name = basename(path);
  const key = identityKey(name, stats);
  if (visited.has(key)) {
    throw new SymlinkLoopError(path);
  }
  visited.add(key);

  return {
    path,
    name,
    size: Number(stats.size),
    mode: Number(stats.mode),
    modifiedAt: stats.mtime,
    isDirectory: stats.isDirectory(),
    isSymbolicLink: linkStats.isSymbolicLink(),
  };
}
