import { formatTreeError, isTreeError, TreeError } from './tree-errors';

describe('TreeError', () => {
  it('names the nodes involved in a cycle', () => {
    const error = new TreeError('cyclic-reference', { nodeId: 'a', parentId: 'b' });

    expect(error.message).toBe('cyclic reference detected in tree: node "a" -> parent "b"');
    expect(error.name).toBe('TreeError');
  });

  it('names the missing parent', () => {
    const error = new TreeError('parent-not-found', { nodeId: 'child', parentId: 'ghost' });

    expect(error.message).toBe('parent node not found: parent id "ghost" not found for node "child"');
  });

  it('carries the path and cause of filesystem failures', () => {
    const cause = new Error('ENOENT');
    const error = new TreeError('file-system', { path: '/data/x', cause });

    expect(error.message).toBe('file system operation failed: /data/x: ENOENT');
    expect(error.path).toBe('/data/x');
    expect(error.cause).toBe(cause);
  });

  it('uses the bare message without details', () => {
    expect(new TreeError('traversal-limit').message).toBe('traversal limit exceeded');
  });

  it('narrows by reason', () => {
    const error: unknown = new TreeError('empty-id');

    expect(isTreeError(error)).toBeTrue();
    expect(isTreeError(error, 'empty-id')).toBeTrue();
    expect(isTreeError(error, 'node-not-found')).toBeFalse();
    expect(isTreeError(new Error('plain'))).toBeFalse();
  });

  it('formats anything thrown for a status line', () => {
    expect(formatTreeError(new TreeError('node-not-found', { nodeId: 'x' }))).toBe('node not found in tree: x');
    expect(formatTreeError('stop')).toBe('stop');
    expect(formatTreeError(42)).toBe('Unknown error');
  });
});
