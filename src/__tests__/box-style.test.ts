import { describe, it, expect } from 'vitest';
import { normalizeBoxName, resolveBoxStyle } from '../core/console/index.js';

describe('resolveBoxStyle', () => {
  it('should resolve decorated names', () => {
    expect(resolveBoxStyle('Double-Box')).toBe('double');
    expect(resolveBoxStyle('minimal heavy')).toBe('minimal_heavy');
    expect(resolveBoxStyle('SIMPLE_HEAD')).toBe('simple_head');
  });

  it('should resolve aliases', () => {
    expect(resolveBoxStyle('round')).toBe('rounded');
    expect(resolveBoxStyle('thick')).toBe('heavy');
  });

  it('should fall back to rounded', () => {
    expect(resolveBoxStyle('nonexistent')).toBe('rounded');
    expect(resolveBoxStyle(undefined)).toBe('rounded');
    expect(resolveBoxStyle(null)).toBe('rounded');
    expect(resolveBoxStyle('')).toBe('rounded');
  });
});

describe('normalizeBoxName', () => {
  it('should lower-case, underscore and drop a box suffix', () => {
    expect(normalizeBoxName('  Square Box ')).toBe('square');
    expect(normalizeBoxName('minimal--double')).toBe('minimal_double');
  });
});
