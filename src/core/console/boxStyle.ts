/**
 * Border-shape resolution for panels and tables.
 */

import type { BoxStyle } from '../models/index.js';

const BOX_ALIASES: Readonly<Record<string, BoxStyle>> = {
  rounded: 'rounded',
  round: 'rounded',
  square: 'square',
  heavy: 'heavy',
  thick: 'heavy',
  double: 'double',
  ascii: 'ascii',
  minimal: 'minimal',
  minimal_heavy: 'minimal_heavy',
  minimal_double: 'minimal_double',
  simple: 'simple',
  simple_heavy: 'simple_heavy',
  simple_head: 'simple_head',
};

export const DEFAULT_BOX_STYLE: BoxStyle = 'rounded';

/** Normalize a box name: case-insensitive, `-` and spaces as `_`, optional `box` suffix */
export function normalizeBoxName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[-\s]+/g, '_')
    .replace(/_box$/, '');
}

/**
 * Resolve a box name to a border shape.
 * Unknown or missing names fall back to `rounded` so a typo never breaks output.
 */
export function resolveBoxStyle(name?: string | null): BoxStyle {
  if (!name) {
    return DEFAULT_BOX_STYLE;
  }
  return BOX_ALIASES[normalizeBoxName(name)] ?? DEFAULT_BOX_STYLE;
}
