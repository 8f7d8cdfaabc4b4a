import type { TreeNode } from '../engine/tree-node';
import { VisibleCursor } from '../engine/cursors';
import { TreeRenderProvider } from '../types/tree-provider';
import { RenderedLine } from '../types/tree-render';
import { normalizeIconWidth, truncateToWidth } from './icon-width';

export interface RenderSource<T> {
  roots: readonly TreeNode<T>[];
  provider: TreeRenderProvider<T>;
  isFocused(id: string): boolean;
  truncateWidth: number;
}

export interface RenderWindow {
  offset: number;
  /** Omit to render every line from `offset` on. */
  height?: number;
}

export interface RenderPass<T> {
  lines: RenderedLine<T>[];
  totalLines: number;
}

/**
 * Branch glyphs for a non-root line. One column group per ancestor below the
 * root, then the connector for the node itself.
 */
export function buildPrefix(ancestorIsLast: readonly boolean[], isLast: boolean): string {
  let prefix = '';
  for (const last of ancestorIsLast) {
    prefix += last ? '    ' : '│   ';
  }
  return prefix + (isLast ? '└── ' : '├── ');
}

/** Visible-order index of the first focused node, or -1. */
export function locateFocusIndex<T>(
  roots: readonly TreeNode<T>[],
  isFocused: (id: string) => boolean,
  signal?: AbortSignal,
): number {
  let index = 0;
  for (const info of new VisibleCursor(roots, signal)) {
    if (isFocused(info.node.id)) {
      return index;
    }
    index += 1;
  }
  return -1;
}

/**
 * Single pass over the visible nodes. The ancestor stack is kept up to date
 * for every node so prefixes inside the window are right, but only lines in
 * `[offset, offset + height)` are formatted.
 */
export function renderWindow<T>(
  source: RenderSource<T>,
  window: RenderWindow,
  signal?: AbortSignal,
): RenderPass<T> {
  const start = Math.max(0, window.offset);
  const end = window.height === undefined ? Number.POSITIVE_INFINITY : start + window.height;
  const ancestorIsLast: boolean[] = [];
  const lines: RenderedLine<T>[] = [];
  let index = 0;

  for (const { node, depth, isLast } of new VisibleCursor(source.roots, signal)) {
    ancestorIsLast.length = Math.min(ancestorIsLast.length, depth);
    // A hidden ancestor leaves a gap; draw it as blank space.
    while (ancestorIsLast.length < depth) {
      ancestorIsLast.push(true);
    }
    ancestorIsLast[depth] = isLast;

    if (index >= start && index < end) {
      lines.push(renderLine(source, node, index, depth, isLast, ancestorIsLast));
    }
    index += 1;
  }

  return { lines, totalLines: index };
}

function renderLine<T>(
  source: RenderSource<T>,
  node: TreeNode<T>,
  index: number,
  depth: number,
  isLast: boolean,
  ancestorIsLast: readonly boolean[],
): RenderedLine<T> {
  const { provider } = source;
  const prefix = depth > 0 ? buildPrefix(ancestorIsLast.slice(0, depth), isLast) : '';
  const focused = source.isFocused(node.id);
  const style = provider.getStyle(node, focused);
  const plain = truncateToWidth(
    prefix + normalizeIconWidth(provider.getIcon(node)) + provider.format(node),
    source.truncateWidth,
  );
  const text = provider.paint ? provider.paint(plain, style) : plain;

  return { node, index, depth, isLast, focused, style, plain, text };
}
