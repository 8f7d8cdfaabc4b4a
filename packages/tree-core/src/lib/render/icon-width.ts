import { getCharWidth, getStringWidth } from '../utils/char-width';

const ICON_COLUMNS = 3;
const ELLIPSIS = '…';

/**
 * Pads an icon so labels line up: narrow icons are padded to three columns,
 * wider ones get a single separating space unless they already end in one.
 */
export function normalizeIconWidth(icon: string): string {
  if (icon === '') {
    return '';
  }

  const width = getStringWidth(icon);
  if (width >= ICON_COLUMNS) {
    return icon.endsWith(' ') ? icon : `${icon} `;
  }
  return icon + ' '.repeat(ICON_COLUMNS - width);
}

/**
 * Cuts `text` to at most `maxWidth` display columns, ending in an ellipsis
 * when anything was dropped. A width of zero or less leaves the text alone.
 */
export function truncateToWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0 || getStringWidth(text) <= maxWidth) {
    return text;
  }

  const budget = maxWidth - 1;
  let used = 0;
  let kept = '';
  for (const char of text) {
    const width = getCharWidth(char);
    if (used + width > budget) {
      break;
    }
    kept += char;
    used += width;
  }
  return kept + ELLIPSIS;
}
