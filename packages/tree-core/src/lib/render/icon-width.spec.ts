import { normalizeIconWidth, truncateToWidth } from './icon-width';

describe('icon width', () => {
  it('leaves an empty icon empty', () => {
    expect(normalizeIconWidth('')).toBe('');
  });

  it('pads narrow icons to three columns', () => {
    expect(normalizeIconWidth('•')).toBe('•  ');
    expect(normalizeIconWidth('📁')).toBe('📁 ');
  });

  it('adds one space to wide icons unless one is already there', () => {
    expect(normalizeIconWidth('[D]')).toBe('[D] ');
    expect(normalizeIconWidth('[D] ')).toBe('[D] ');
  });
});

describe('truncateToWidth', () => {
  it('keeps text that fits', () => {
    expect(truncateToWidth('short', 10)).toBe('short');
    expect(truncateToWidth('anything at all', 0)).toBe('anything at all');
  });

  it('cuts to the width including the ellipsis', () => {
    expect(truncateToWidth('hello world', 8)).toBe('hello w…');
  });

  it('counts wide characters as two columns', () => {
    expect(truncateToWidth('日本語テキスト', 5)).toBe('日本…');
  });
});
