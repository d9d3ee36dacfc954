import { describe, it, expect } from 'vitest';
import { allows, clampVerbosity } from '../core/verbosity/index.js';
import type { VerbosityLevel } from '../core/models/index.js';

describe('allows', () => {
  const cases: [VerbosityLevel, 'MESSAGE' | 'EVENT', string | undefined, boolean][] = [
    [0, 'MESSAGE', undefined, false],
    [0, 'EVENT', 'INFO', false],
    [0, 'EVENT', 'DEBUG', false],
    [1, 'MESSAGE', undefined, true],
    [1, 'EVENT', 'INFO', false],
    [1, 'EVENT', 'ERROR', false],
    [2, 'MESSAGE', undefined, true],
    [2, 'EVENT', 'INFO', true],
    [2, 'EVENT', 'ERROR', true],
    [2, 'EVENT', 'DEBUG', false],
    [3, 'MESSAGE', undefined, true],
    [3, 'EVENT', 'WARNING', true],
    [3, 'EVENT', 'DEBUG', true],
  ];

  it.each(cases)('verbosity %i, %s %s → %s', (verbosity, category, level, expected) => {
    expect(allows(verbosity, category, level)).toBe(expected);
  });

  it('should treat event levels case-insensitively', () => {
    expect(allows(2, 'EVENT', 'debug')).toBe(false);
  });

  it('should allow unknown event levels at verbosity 2', () => {
    expect(allows(2, 'EVENT', 'TRACE')).toBe(true);
  });
});

describe('clampVerbosity', () => {
  it('should clamp out-of-range values', () => {
    expect(clampVerbosity(99)).toBe(3);
    expect(clampVerbosity(-5)).toBe(0);
  });

  it('should truncate fractions toward zero', () => {
    expect(clampVerbosity(2.7)).toBe(2);
    expect(clampVerbosity(0.9)).toBe(0);
  });

  it('should map NaN to 0', () => {
    expect(clampVerbosity(Number.NaN)).toBe(0);
  });

  it('should keep values in range', () => {
    expect(clampVerbosity(1)).toBe(1);
    expect(clampVerbosity(3)).toBe(3);
  });
});
