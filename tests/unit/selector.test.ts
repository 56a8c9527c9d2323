import { describe, it, expect } from 'vitest';
import { selectModel } from '../../src/lib/selector/index.js';
import type { ComplexityLabel } from '../../src/types/timing.js';

describe('selectModel', () => {
  it('should pick the lowest error', () => {
    const errors = new Map<ComplexityLabel, number>([
      ['O(1)', 0.4],
      ['O(n)', 0.1],
      ['O(n^2)', 0.3],
    ]);
    expect(selectModel(errors)).toBe('O(n)');
  });

  it('should break ties in favour of the earlier entry', () => {
    const errors = new Map<ComplexityLabel, number>([
      ['O(log n)', 0.2],
      ['O(n)', 0.2],
      ['O(1)', 0.2],
    ]);
    expect(selectModel(errors)).toBe('O(log n)');
  });

  it('should ignore NaN errors', () => {
    const errors = new Map<ComplexityLabel, number>([
      ['O(1)', Number.NaN],
      ['O(n)', 5],
    ]);
    expect(selectModel(errors)).toBe('O(n)');
  });

  it('should report unknown for an empty table', () => {
    expect(selectModel(new Map())).toBe('unknown');
  });
});
