/**
 * Text display width utilities
 *
 * Pure functions for measuring, padding and truncating text based on
 * terminal display width, with full-width (CJK) character support.
 */

const ANSI_PATTERN = /\x1b\[[0-9;?]*[ -/]*[@-~]/g;

/** Remove ANSI escape sequences */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/**
 * Check if a Unicode code point is full-width (occupies 2 columns).
 * Covers CJK unified ideographs, Hangul, fullwidth forms, etc.
 */
export function isFullWidth(code: number): boolean {
  return (
    (code >= 0x1100 && code <= 0x115F) ||  // Hangul Jamo
    (code >= 0x2E80 && code <= 0x9FFF) ||  // CJK radicals, symbols, ideographs
    (code >= 0xAC00 && code <= 0xD7AF) ||  // Hangul syllables
    (code >= 0xF900 && code <= 0xFAFF) ||  // CJK compatibility ideographs
    (code >= 0xFE10 && code <= 0xFE6F) ||  // CJK compatibility forms
    (code >= 0xFF01 && code <= 0xFF60) ||  // Fullwidth ASCII variants
    (code >= 0xFFE0 && code <= 0xFFE6) ||  // Fullwidth symbols
    (code >= 0x1F300 && code <= 0x1FAFF) || // Pictographs and emoji
    (code >= 0x20000 && code <= 0x2FA1F)   // CJK extension B+
  );
}

/**
 * Calculate the display width of a string.
 * ANSI sequences are ignored; full-width characters count as 2.
 */
export function getDisplayWidth(text: string): number {
  let width = 0;
  for (const char of stripAnsi(text)) {
    const code = char.codePointAt(0) ?? 0;
    width += isFullWidth(code) ? 2 : 1;
  }
  return width;
}

/**
 * Truncate plain text to fit within maxWidth display columns.
 * Appends '…' if truncated. The ellipsis itself counts as 1 column.
 */
export function truncateText(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (getDisplayWidth(text) <= maxWidth) return text;
  let width = 0;
  let i = 0;
  for (const char of text) {
    const charWidth = isFullWidth(char.codePointAt(0) ?? 0) ? 2 : 1;
    if (width + charWidth > maxWidth - 1) {
      break;
    }
    width += charWidth;
    i += char.length;
  }
  return text.slice(0, i) + '…';
}

export type Alignment = 'left' | 'right' | 'center';

/** Pad text with spaces to a display width; never truncates */
export function padToWidth(text: string, width: number, align: Alignment = 'left'): string {
  const gap = width - getDisplayWidth(text);
  if (gap <= 0) return text;
  if (align === 'right') return ' '.repeat(gap) + text;
  if (align === 'center') {
    const left = Math.floor(gap / 2);
    return ' '.repeat(left) + text + ' '.repeat(gap - left);
  }
  return text + ' '.repeat(gap);
}

/** Hard-wrap plain text into lines of at most `width` columns */
export function wrapText(text: string, width: number): string[] {
  if (width <= 0) return [text];
  const lines: string[] = [];
  let current = '';
  let currentWidth = 0;
  for (const char of text) {
    const charWidth = isFullWidth(char.codePointAt(0) ?? 0) ? 2 : 1;
    if (currentWidth + charWidth > width) {
      lines.push(current);
      current = '';
      currentWidth = 0;
    }
    current += char;
    currentWidth += charWidth;
  }
  lines.push(current);
  return lines;
}
