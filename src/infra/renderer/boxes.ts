/**
 * Box-drawing character sets.
 *
 * Each set is eight rows of four characters:
 *   top, head, head_row, mid, row, foot_row, foot, bottom
 * and each row is: left, horizontal (or fill), divider, right.
 */

import type { BoxStyle } from '../../core/models/index.js';

const BOX_DEFINITIONS: Readonly<Record<BoxStyle, readonly string[]>> = {
  rounded: [
    '╭─┬╮',
    '│ ││',
    '├─┼┤',
    '│ ││',
    '├─┼┤',
    '├─┼┤',
    '│ ││',
    '╰─┴╯',
  ],
  square: [
    '┌─┬┐',
    '│ ││',
    '├─┼┤',
    '│ ││',
    '├─┼┤',
    '├─┼┤',
    '│ ││',
    '└─┴┘',
  ],
  heavy: [
    '┏━┳┓',
    '┃ ┃┃',
    '┣━╋┫',
    '┃ ┃┃',
    '┣━╋┫',
    '┣━╋┫',
    '┃ ┃┃',
    '┗━┻┛',
  ],
  double: [
    '╔═╦╗',
    '║ ║║',
    '╠═╬╣',
    '║ ║║',
    '╠═╬╣',
    '╠═╬╣',
    '║ ║║',
    '╚═╩╝',
  ],
  ascii: [
    '+--+',
    '| ||',
    '|-+|',
    '| ||',
    '|-+|',
    '|-+|',
    '| ||',
    '+--+',
  ],
  minimal: [
    '  ╷ ',
    '  │ ',
    '╶─┼╴',
    '  │ ',
    '╶─┼╴',
    '╶─┼╴',
    '  │ ',
    '  ╵ ',
  ],
  minimal_heavy: [
    '  ╷ ',
    '  │ ',
    '╺━┿╸',
    '  │ ',
    '╶─┼╴',
    '╶─┼╴',
    '  │ ',
    '  ╵ ',
  ],
  minimal_double: [
    '  ╷ ',
    '  │ ',
    ' ═╪ ',
    '  │ ',
    ' ─┼ ',
    ' ─┼ ',
    '  │ ',
    '  ╵ ',
  ],
  simple: [
    '    ',
    '    ',
    ' ── ',
    '    ',
    '    ',
    ' ── ',
    '    ',
    '    ',
  ],
  simple_heavy: [
    '    ',
    '    ',
    ' ━━ ',
    '    ',
    '    ',
    ' ━━ ',
    '    ',
    '    ',
  ],
  simple_head: [
    '    ',
    '    ',
    ' ── ',
    '    ',
    '    ',
    '    ',
    '    ',
    '    ',
  ],
};

/** One row of a box: left edge, horizontal fill, column divider, right edge */
export interface BoxRow {
  left: string;
  horizontal: string;
  divider: string;
  right: string;
}

export interface BoxChars {
  top: BoxRow;
  head: BoxRow;
  headRow: BoxRow;
  mid: BoxRow;
  bottom: BoxRow;
}

function parseRow(row: string | undefined): BoxRow {
  const chars = [...(row ?? '    ')];
  return {
    left: chars[0] ?? ' ',
    horizontal: chars[1] ?? ' ',
    divider: chars[2] ?? ' ',
    right: chars[3] ?? ' ',
  };
}

const cache = new Map<BoxStyle, BoxChars>();

export function getBoxChars(style: BoxStyle): BoxChars {
  const cached = cache.get(style);
  if (cached) return cached;

  const rows = BOX_DEFINITIONS[style];
  const chars: BoxChars = {
    top: parseRow(rows[0]),
    head: parseRow(rows[1]),
    headRow: parseRow(rows[2]),
    mid: parseRow(rows[3]),
    bottom: parseRow(rows[7]),
  };
  cache.set(style, chars);
  return chars;
}
