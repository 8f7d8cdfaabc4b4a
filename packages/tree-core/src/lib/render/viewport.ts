/**
 * Scroll state for a fixed-height window over the rendered lines. The tree
 * updates `offset` and `totalLines` on every windowed render.
 */
export class TreeViewport {
  offset: number;
  height: number;
  totalLines = 0;

  constructor(height: number, offset = 0) {
    this.height = height;
    this.offset = Math.max(0, offset);
  }

  /** Scrolls the least amount needed to bring `index` into the window. */
  keepInView(index: number): void {
    if (index < 0 || this.height <= 0) {
      return;
    }
    if (index < this.offset) {
      this.offset = index;
    } else if (index >= this.offset + this.height) {
      this.offset = Math.max(0, index - this.height + 1);
    }
  }

  /**
   * Records the line total and pulls `offset` back so the window ends at the
   * last line. Returns whether the offset moved.
   */
  fit(totalLines: number): boolean {
    this.totalLines = totalLines;
    const maxOffset = Math.max(0, totalLines - Math.max(0, this.height));
    if (this.offset <= maxOffset) {
      return false;
    }
    this.offset = maxOffset;
    return true;
  }

  scrollBy(delta: number): void {
    const maxOffset = Math.max(0, this.totalLines - this.height);
    this.offset = Math.min(maxOffset, Math.max(0, this.offset + delta));
  }

  get atTop(): boolean {
    return this.offset === 0;
  }

  get atBottom(): boolean {
    return this.offset + this.height >= this.totalLines;
  }
}
