import { DefaultRenderProvider } from '../render/default-provider';
import { locateFocusIndex, renderWindow, RenderSource } from '../render/renderer';
import { TreeViewport } from '../render/viewport';
import { TreeConfig } from '../types/tree-config';
import { TreeError } from '../types/tree-errors';
import { TreeId, TreeSearchResult, TreeStats } from '../types/tree-node';
import {
  TreeFocusPolicy,
  TreeRenderProvider,
  TreeSearchPredicate,
} from '../types/tree-provider';
import { TreeRenderResult } from '../types/tree-render';
import {
  BreadthFirstCursor,
  DepthFirstCursor,
  FilteredCursor,
  PostOrderCursor,
  VisibleCursor,
} from './cursors';
import { defaultSearchPredicate, revealPath } from './search';
import { defaultFocusPolicy, FocusSet, selectVisibleRange } from './selection';
import { TreeNode } from './tree-node';

export type TreeOptions<T> = Pick<
  TreeConfig<T>,
  'searchPredicate' | 'focusPolicy' | 'renderProvider' | 'truncateWidth'
>;

/**
 * Root list plus focus state. Every read and mutation runs synchronously to
 * completion; operations that walk the tree take an optional AbortSignal and
 * throw its reason when it fires.
 */
export class Tree<T> {
  private roots: TreeNode<T>[];
  private readonly focus = new FocusSet<T>();
  private readonly searchPredicate: TreeSearchPredicate<T>;
  private readonly focusPolicy: TreeFocusPolicy<T>;
  private readonly renderProvider: TreeRenderProvider<T>;
  private readonly truncateWidth: number;

  constructor(nodes: readonly TreeNode<T>[] = [], options: TreeOptions<T> = {}) {
    this.roots = [...nodes];
    this.searchPredicate = options.searchPredicate ?? defaultSearchPredicate;
    this.focusPolicy = options.focusPolicy ?? defaultFocusPolicy;
    this.renderProvider = options.renderProvider ?? new DefaultRenderProvider<T>();
    this.truncateWidth = options.truncateWidth ?? 0;

    if (this.roots.length > 0) {
      this.focus.add(this.roots[0]);
    }
  }

  get nodes(): readonly TreeNode<T>[] {
    return this.roots;
  }

  /** Replaces the roots. Focus and strategies are left as they are. */
  setNodes(nodes: readonly TreeNode<T>[]): void {
    this.roots = [...nodes];
  }

  // Cursors

  all(signal?: AbortSignal): DepthFirstCursor<T> {
    return new DepthFirstCursor(this.roots, { followCollapsed: true, signal });
  }

  breadthFirst(signal?: AbortSignal): BreadthFirstCursor<T> {
    return new BreadthFirstCursor(this.roots, { followCollapsed: true, signal });
  }

  bottomUp(signal?: AbortSignal): PostOrderCursor<T> {
    return new PostOrderCursor(this.roots, { followCollapsed: true, signal });
  }

  allVisible(signal?: AbortSignal): VisibleCursor<T> {
    return new VisibleCursor(this.roots, signal);
  }

  allFocused(signal?: AbortSignal): FilteredCursor<T> {
    return new FilteredCursor(this.all(signal), (node) => this.focus.has(node.id));
  }

  getVisibleNodes(signal?: AbortSignal): TreeNode<T>[] {
    return Array.from(this.allVisible(signal), (info) => info.node);
  }

  findById(id: TreeId, signal?: AbortSignal): TreeNode<T> {
    for (const { node } of this.all(signal)) {
      if (node.id === id) {
        return node;
      }
    }
    throw new TreeError('node-not-found', { nodeId: id });
  }

  // Focus

  getFocusedId(): TreeId {
    return this.focus.primary?.id ?? '';
  }

  getFocusedNode(): TreeNode<T> | null {
    return this.focus.primary;
  }

  getAllFocusedIds(): TreeId[] {
    return this.focus.idList();
  }

  getAllFocusedNodes(): TreeNode<T>[] {
    return this.focus.nodes();
  }

  isFocused(id: TreeId): boolean {
    return this.focus.has(id);
  }

  /**
   * Focuses exactly one node. An empty id clears the focus set. Returns
   * whether anything changed.
   */
  setFocusedId(id: TreeId, signal?: AbortSignal): boolean {
    if (id === '') {
      return this.focus.clear();
    }

    const node = this.findById(id, signal);
    if (this.focus.isSole(node)) {
      return false;
    }
    this.focus.replace([node]);
    return true;
  }

  addFocusedId(id: TreeId, signal?: AbortSignal): boolean {
    if (this.focus.has(id)) {
      return false;
    }
    return this.focus.add(this.findById(id, signal));
  }

  removeFocusedId(id: TreeId): boolean {
    return this.focus.remove(id);
  }

  toggleFocusedId(id: TreeId, signal?: AbortSignal): boolean {
    if (this.focus.has(id)) {
      return this.focus.remove(id);
    }
    return this.addFocusedId(id, signal);
  }

  /** Replaces the focus set. Nothing changes unless every id resolves. */
  setAllFocusedIds(ids: readonly TreeId[], signal?: AbortSignal): void {
    const nodes = ids.map((id) => this.findById(id, signal));
    this.focus.replace(nodes);
  }

  clearAllFocus(): void {
    this.focus.clear();
  }

  /**
   * Moves the primary focus by `offset` over the visible nodes and drops
   * any other focused node.
   */
  move(offset: number, signal?: AbortSignal): boolean {
    const visible = this.getVisibleNodes(signal);
    const current = this.focus.primary;
    const next = this.focusPolicy(visible, current, offset, signal);

    if (!next || next === current) {
      return false;
    }
    this.focus.replace([next]);
    return true;
  }

  /**
   * Like `move`, but adds every visible node between the old primary and the
   * new one to the focus set; the new node becomes primary.
   */
  moveExtend(offset: number, signal?: AbortSignal): boolean {
    const visible = this.getVisibleNodes(signal);
    const current = this.focus.primary;
    const next = this.focusPolicy(visible, current, offset, signal);

    if (!next || next === current) {
      return false;
    }
    if (!current) {
      this.focus.replace([next]);
      return true;
    }

    for (const node of selectVisibleRange(current, next, visible)) {
      this.focus.add(node);
    }
    // A hidden primary leaves the range empty; the target still joins.
    this.focus.add(next);
    this.focus.promote(next);
    return true;
  }

  // Expansion and visibility

  setExpanded(id: TreeId, expanded: boolean, signal?: AbortSignal): boolean {
    this.findById(id, signal).setExpanded(expanded);
    return true;
  }

  /** Flips the expansion of every focused node. */
  toggleFocused(): void {
    for (const node of this.focus.nodes()) {
      node.toggle();
    }
  }

  expandAll(signal?: AbortSignal): void {
    for (const { node } of this.all(signal)) {
      node.expand();
    }
  }

  collapseAll(signal?: AbortSignal): void {
    for (const { node } of this.all(signal)) {
      node.collapse();
    }
  }

  showAll(signal?: AbortSignal): void {
    for (const { node } of this.all(signal)) {
      node.setVisible(true);
    }
  }

  hideAll(signal?: AbortSignal): void {
    for (const { node } of this.all(signal)) {
      node.setVisible(false);
    }
  }

  // Search

  search(term: string, signal?: AbortSignal): TreeSearchResult<T> {
    const matches: TreeNode<T>[] = [];
    if (term === '') {
      return { matches };
    }

    try {
      for (const { node } of this.all(signal)) {
        if (this.searchPredicate(node, term, signal)) {
          matches.push(node);
        }
      }
    } catch (error) {
      return { matches, error: this.cancellation(error, signal) };
    }
    return { matches };
  }

  /**
   * Searches, then narrows the display to the matches and their ancestors
   * and focuses every match. With no match everything is shown and
   * expanded; an empty term changes nothing.
   */
  searchAndExpand(term: string, signal?: AbortSignal): TreeSearchResult<T> {
    if (term === '') {
      return { matches: [] };
    }

    const result = this.search(term, signal);
    if (result.error !== undefined) {
      return result;
    }

    try {
      if (result.matches.length === 0) {
        this.showAll(signal);
        this.expandAll(signal);
        return result;
      }

      this.collapseAll(signal);
      this.hideAll(signal);
    } catch (error) {
      return { matches: result.matches, error: this.cancellation(error, signal) };
    }

    for (const match of result.matches) {
      revealPath(match);
    }
    this.focus.replace(result.matches);
    return result;
  }

  // Rendering

  render(signal?: AbortSignal): string {
    const pass = renderWindow(this.renderSource(), { offset: 0 }, signal);
    return pass.lines.map((line) => line.text).join('\n');
  }

  /**
   * Scrolls `viewport` so the primary focus is inside it, then renders only
   * the lines the window shows. The viewport's offset and line total are
   * updated in place; an offset past the end is pulled back when the tree
   * has shrunk.
   */
  renderViewport(viewport: TreeViewport, signal?: AbortSignal): TreeRenderResult<T> {
    const focusIndex = locateFocusIndex(this.roots, (id) => this.focus.has(id), signal);
    viewport.keepInView(focusIndex);

    const height = Math.max(0, viewport.height);
    let pass = renderWindow(this.renderSource(), { offset: viewport.offset, height }, signal);
    if (viewport.fit(pass.totalLines)) {
      pass = renderWindow(this.renderSource(), { offset: viewport.offset, height }, signal);
    }

    return {
      lines: pass.lines,
      text: pass.lines.map((line) => line.text).join('\n'),
      totalLines: pass.totalLines,
      offset: viewport.offset,
    };
  }

  stats(signal?: AbortSignal): TreeStats {
    let total = 0;
    let expanded = 0;
    let maxDepth = 0;
    for (const { node, depth } of this.all(signal)) {
      total += 1;
      if (node.expanded) {
        expanded += 1;
      }
      maxDepth = Math.max(maxDepth, depth);
    }

    const visible = this.getVisibleNodes(signal).length;
    return { total, visible, expanded, focused: this.focus.size, maxDepth };
  }

  private renderSource(): RenderSource<T> {
    return {
      roots: this.roots,
      provider: this.renderProvider,
      isFocused: (id) => this.focus.has(id),
      truncateWidth: this.truncateWidth,
    };
  }

  /** Passes an abort reason through; anything else is rethrown. */
  private cancellation(error: unknown, signal?: AbortSignal): unknown {
    if (signal?.aborted && error === signal.reason) {
      return error;
    }
    throw error;
  }
}
