/**
 * Verbosity gating.
 *
 * 0 = silent, 1 = messages/structure/data, 2 = adds non-DEBUG events,
 * 3 = adds DEBUG events.
 */

import type { EventLevel, OutputCategory, VerbosityLevel } from '../models/index.js';

export const MIN_VERBOSITY: VerbosityLevel = 0;
export const MAX_VERBOSITY: VerbosityLevel = 3;

/** Clamp any number into 0..3 (fractions truncate, NaN becomes 0) */
export function clampVerbosity(value: number): VerbosityLevel {
  if (Number.isNaN(value) || value <= MIN_VERBOSITY) return 0;
  if (value >= MAX_VERBOSITY) return 3;
  const level = Math.trunc(value);
  if (level === 1 || level === 2) return level;
  return 0;
}

/** Decide whether a call of the given category and level produces output */
export function allows(
  verbosity: VerbosityLevel,
  category: OutputCategory,
  level?: EventLevel | string,
): boolean {
  if (verbosity === 0) {
    return false;
  }
  if (category === 'MESSAGE') {
    return true;
  }
  if (verbosity < 2) {
    return false;
  }
  if (verbosity === 2 && level?.toUpperCase() === 'DEBUG') {
    return false;
  }
  return true;
}
