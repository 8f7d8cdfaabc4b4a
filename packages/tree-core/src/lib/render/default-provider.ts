import type { TreeNode } from '../engine/tree-node';
import { isFileInfo } from '../types/file-info';
import { TreeRenderProvider } from '../types/tree-provider';

export const DEFAULT_STYLE = 'default';
export const FOCUSED_STYLE = 'focused';

export interface DefaultRenderProviderOptions {
  /** Render a two-space placeholder instead of glyphs. */
  disableIcons?: boolean;
  expandedIcon?: string;
  collapsedIcon?: string;
  leafIcon?: string;
}

/**
 * Plain-text provider: arrow glyphs for branches, a bullet for leaves, a
 * trailing slash on directories. Styles are the tokens `focused` and
 * `default`; painting is left to the caller.
 */
export class DefaultRenderProvider<T> implements TreeRenderProvider<T> {
  private readonly disableIcons: boolean;
  private readonly expandedIcon: string;
  private readonly collapsedIcon: string;
  private readonly leafIcon: string;

  constructor(options: DefaultRenderProviderOptions = {}) {
    this.disableIcons = options.disableIcons ?? false;
    this.expandedIcon = options.expandedIcon ?? '▼';
    this.collapsedIcon = options.collapsedIcon ?? '▶';
    this.leafIcon = options.leafIcon ?? '•';
  }

  getIcon(node: TreeNode<T>): string {
    if (this.disableIcons) {
      return '  ';
    }
    if (!node.hasChildren) {
      return this.leafIcon;
    }
    return node.expanded ? this.expandedIcon : this.collapsedIcon;
  }

  format(node: TreeNode<T>): string {
    if (isFileInfo(node.data) && node.data.isDirectory) {
      return `${node.name}/`;
    }
    return node.name;
  }

  getStyle(_node: TreeNode<T>, focused: boolean): string {
    return focused ? FOCUSED_STYLE : DEFAULT_STYLE;
  }
}
