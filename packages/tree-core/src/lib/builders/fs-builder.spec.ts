import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { isTreeError, TreeError } from '../types/tree-errors';
import { createTreeFromFileSystem } from './fs-builder';

describe('createTreeFromFileSystem', () => {
  let root: string;

  beforeAll(() => {
    root = mkdtempSync(join(tmpdir(), 'fs-builder-'));
    mkdirSync(join(root, 'alpha'));
    writeFileSync(join(root, 'alpha', 'one.txt'), 'one');
    writeFileSync(join(root, 'beta.txt'), 'beta');
  });

  afterAll(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('mirrors the directory structure in name order', async () => {
    const { tree, error } = await createTreeFromFileSystem(root);

    expect(error).toBeUndefined();
    expect(tree.all().toArray().map((info) => info.node.id)).toEqual([
      root,
      join(root, 'alpha'),
      join(root, 'alpha', 'one.txt'),
      join(root, 'beta.txt'),
    ]);

    const alpha = tree.findById(join(root, 'alpha'));
    expect(alpha.name).toBe('alpha');
    expect(alpha.data.isDirectory).toBeTrue();
    expect(tree.findById(join(root, 'beta.txt')).data.size).toBe(4);
  });

  it('stops descending at the depth limit', async () => {
    const { tree } = await createTreeFromFileSystem(root, { maxDepth: 1 });

    expect(tree.findById(join(root, 'alpha')).hasChildren).toBeFalse();
    expect(tree.stats().total).toBe(3);
  });

  it('returns the bare root when the cap is one', async () => {
    const { tree, error } = await createTreeFromFileSystem(root, { traversalCap: 1 });

    expect(isTreeError(error, 'traversal-limit')).toBeTrue();
    expect(error instanceof TreeError ? error.path : undefined).toBe(join(root, 'alpha'));
    expect(tree.nodes.length).toBe(1);
    expect(tree.nodes[0].hasChildren).toBeFalse();
  });

  it('keeps every entry scanned before the cap', async () => {
    const { tree, error } = await createTreeFromFileSystem(root, { traversalCap: 3 });

    expect(isTreeError(error, 'traversal-limit')).toBeTrue();
    expect(tree.all().toArray().map((info) => info.node.name)).toEqual([
      tree.nodes[0].name,
      'alpha',
      'one.txt',
    ]);
  });

  it('applies the filter to entries', async () => {
    const { tree } = await createTreeFromFileSystem(root, {
      filter: (info) => !info.name.endsWith('.txt'),
    });

    expect(tree.stats().total).toBe(2);
  });

  it('reports a missing path with an empty tree', async () => {
    const missing = join(root, 'does-not-exist');

    const { tree, error } = await createTreeFromFileSystem(missing);

    expect(isTreeError(error, 'file-system')).toBeTrue();
    expect(error instanceof TreeError ? error.path : undefined).toBe(missing);
    expect(tree.nodes).toEqual([]);
  });

  describe('symlinks', () => {
    let loopDir: string;

    beforeAll(() => {
      loopDir = mkdtempSync(join(tmpdir(), 'fs-loop-'));
      symlinkSync(join(loopDir, 'loop2'), join(loopDir, 'loop1'));
      symlinkSync(join(loopDir, 'loop1'), join(loopDir, 'loop2'));
    });

    afterAll(() => {
      rmSync(loopDir, { recursive: true, force: true });
    });

    it('fails on a symlink loop when following links', async () => {
      const { tree, error } = await createTreeFromFileSystem(loopDir, { followSymlinks: true });

      expect(isTreeError(error, 'file-system')).toBeTrue();
      expect(error instanceof TreeError ? error.path : undefined).toBe(join(loopDir, 'loop1'));
      expect(tree.nodes).toEqual([]);
    });

    it('lists the links themselves when not following them', async () => {
      const { tree, error } = await createTreeFromFileSystem(loopDir);

      expect(error).toBeUndefined();
      const links = tree.nodes[0].children.map((node) => node.data);
      expect(links.map((info) => info.name)).toEqual(['loop1', 'loop2']);
      expect(links.every((info) => info.isSymbolicLink)).toBeTrue();
    });
  });
});
