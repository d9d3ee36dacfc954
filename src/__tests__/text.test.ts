import { describe, it, expect } from 'vitest';
import { getDisplayWidth, padToWidth, stripAnsi, truncateText, wrapText } from '../shared/utils/text.js';
import { splitLines, wrapSpans } from '../infra/renderer/spans.js';

describe('text utilities', () => {
  it('should measure full-width characters as two columns', () => {
    expect(getDisplayWidth('abc')).toBe(3);
    expect(getDisplayWidth('日本')).toBe(4);
    expect(getDisplayWidth('🎉 ok')).toBe(5);
  });

  it('should ignore ANSI sequences', () => {
    expect(stripAnsi('\x1b[31mred\x1b[39m')).toBe('red');
    expect(getDisplayWidth('\x1b[1mbold\x1b[22m')).toBe(4);
  });

  it('should truncate with an ellipsis', () => {
    expect(truncateText('abcdef', 4)).toBe('abc…');
    expect(truncateText('abc', 4)).toBe('abc');
    expect(truncateText('abc', 0)).toBe('');
  });

  it('should pad to a width', () => {
    expect(padToWidth('ab', 5)).toBe('ab   ');
    expect(padToWidth('ab', 5, 'right')).toBe('   ab');
    expect(padToWidth('ab', 5, 'center')).toBe(' ab  ');
    expect(padToWidth('abcdef', 3)).toBe('abcdef');
  });

  it('should hard-wrap text', () => {
    expect(wrapText('abcdef', 4)).toEqual(['abcd', 'ef']);
    expect(wrapText('日本語', 4)).toEqual(['日本', '語']);
  });
});

describe('span layout', () => {
  it('should split spans on newlines and keep styles', () => {
    expect(splitLines([{ text: 'a\nb', style: 's' }, { text: 'c' }])).toEqual([
      [{ text: 'a', style: 's' }],
      [{ text: 'b', style: 's' }, { text: 'c' }],
    ]);
  });

  it('should wrap spans across a style boundary', () => {
    expect(wrapSpans([{ text: 'abc', style: 'x' }, { text: 'def' }], 4)).toEqual([
      [{ text: 'abc', style: 'x' }, { text: 'd' }],
      [{ text: 'ef' }],
    ]);
  });
});
