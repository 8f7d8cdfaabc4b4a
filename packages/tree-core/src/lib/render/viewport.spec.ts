import { TreeViewport } from './viewport';

describe('TreeViewport', () => {
  it('scrolls down just enough to show a line below the window', () => {
    const viewport = new TreeViewport(5);

    viewport.keepInView(7);

    expect(viewport.offset).toBe(3);
  });

  it('snaps up to a line above the window', () => {
    const viewport = new TreeViewport(5, 6);

    viewport.keepInView(2);

    expect(viewport.offset).toBe(2);
  });

  it('ignores a missing focus and a zero height', () => {
    const viewport = new TreeViewport(5, 4);
    viewport.keepInView(-1);
    expect(viewport.offset).toBe(4);

    const flat = new TreeViewport(0, 1);
    flat.keepInView(10);
    expect(flat.offset).toBe(1);
  });

  it('clamps manual scrolling to the content', () => {
    const viewport = new TreeViewport(5);
    viewport.totalLines = 12;

    viewport.scrollBy(100);
    expect(viewport.offset).toBe(7);
    expect(viewport.atBottom).toBeTrue();

    viewport.scrollBy(-100);
    expect(viewport.atTop).toBeTrue();
  });

  it('pulls the offset back when the content shrinks', () => {
    const viewport = new TreeViewport(4, 17);

    expect(viewport.fit(21)).toBeFalse();
    expect(viewport.offset).toBe(17);

    expect(viewport.fit(6)).toBeTrue();
    expect(viewport.offset).toBe(2);
    expect(viewport.totalLines).toBe(6);

    expect(viewport.fit(1)).toBeTrue();
    expect(viewport.offset).toBe(0);
  });
});
