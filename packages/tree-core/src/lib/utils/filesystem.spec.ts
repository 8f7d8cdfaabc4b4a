import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { FileIdentity, identityKey, safeStat, SymlinkLoopError } from './filesystem';

const identity = (overrides: Partial<FileIdentity> = {}): FileIdentity => ({
  dev: 7n,
  ino: 42n,
  size: 12n,
  mtimeMs: 1700000000000n,
  ...overrides,
});

describe('identityKey', () => {
  it('uses device and inode on POSIX platforms', () => {
    expect(identityKey('note.txt', identity(), 'linux')).toBe('dev:7_ino:42');
  });

  it('keeps inode numbers above 2^53 apart', () => {
    const high = 2n ** 53n;

    const a = identityKey('a', identity({ ino: high }), 'linux');
    const b = identityKey('b', identity({ ino: high + 1n }), 'linux');

    expect(a).toBe('dev:7_ino:9007199254740992');
    expect(b).toBe('dev:7_ino:9007199254740993');
  });

  it('falls back to name and mtime when there is no inode', () => {
    expect(identityKey('note.txt', identity({ ino: 0n }), 'linux')).toBe(
      'fallback:note.txt_1700000000000',
    );
  });

  it('uses name, size and mtime on Windows', () => {
    expect(identityKey('note.txt', identity(), 'win32')).toBe('name:note.txt:12:1700000000000');
  });
});

describe('safeStat', () => {
  let root: string;

  beforeAll(() => {
    root = mkdtempSync(join(tmpdir(), 'safe-stat-'));
    writeFileSync(join(root, 'note.txt'), 'hello');
  });

  afterAll(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('describes a file and rejects a second sighting', async () => {
    const visited = new Set<string>();
    const path = join(root, 'note.txt');

    const info = await safeStat(path, false, visited);

    expect(info.name).toBe('note.txt');
    expect(info.size).toBe(5);
    expect(info.isDirectory).toBeFalse();
    expect(visited.size).toBe(1);
    await expectAsync(safeStat(path, false, visited)).toBeRejectedWithError(SymlinkLoopError);
  });
});
