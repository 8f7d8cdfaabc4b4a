/*
 * Public API Surface of termtree core
 */

// =================== ENGINE ===================
export * from './lib/engine/tree';
export * from './lib/engine/tree-node';
export * from './lib/engine/cursors';
export * from './lib/engine/selection';
export * from './lib/engine/search';

// =================== BUILDERS ===================
export * from './lib/builders/create-tree';
export * from './lib/builders/nested-builder';
export * from './lib/builders/flat-builder';
export * from './lib/builders/fs-builder';
export * from './lib/builders/build-progress';
export * from './lib/builders/tree-transforms';

// =================== RENDERING ===================
export * from './lib/render/renderer';
export * from './lib/render/viewport';
export * from './lib/render/icon-width';
export * from './lib/render/default-provider';

// =================== TYPES & INTERFACES ===================
export * from './lib/types/tree-node';
export * from './lib/types/tree-errors';
export * from './lib/types/tree-config';
export * from './lib/types/tree-adapter';
export * from './lib/types/tree-provider';
export * from './lib/types/tree-render';
export * from './lib/types/file-info';

// =================== UTILITIES ===================
export { getCharWidth, getStringWidth } from './lib/utils/char-width';
export { resolvePath, safeStat, identityKey, SymlinkLoopError } from './lib/utils/filesystem';
export type { FileIdentity } from './lib/utils/filesystem';
