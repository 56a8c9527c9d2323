import { describe, it, expect } from 'vitest';
import { buildInput, isInputKind } from '../../src/lib/inputs/index.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('buildInput', () => {
  it('should build arrays of the requested size', () => {
    const values = buildInput('array', 50, 'test-seed');
    expect(Array.isArray(values)).toBe(true);
    if (!Array.isArray(values)) return;
    expect(values).toHaveLength(50);
    for (const value of values) {
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(1_000_000);
    }
  });

  it('should be deterministic for a seed', () => {
    expect(buildInput('array', 20, 'test-seed')).toEqual(buildInput('array', 20, 'test-seed'));
    expect(buildInput('string', 20, 'test-seed')).toBe(buildInput('string', 20, 'test-seed'));
  });

  it('should build alphabetic strings', () => {
    const text = buildInput('string', 32, 'test-seed');
    expect(text).toMatch(/^[a-zA-Z]{32}$/);
  });

  it('should pass sizes through', () => {
    expect(buildInput('size', 64, 'test-seed')).toBe(64);
  });

  it('should reject non-positive sizes', () => {
    expect(() => buildInput('array', 0, 'test-seed')).toThrow(ValidationError);
    expect(() => buildInput('array', 2.5, 'test-seed')).toThrow(ValidationError);
  });
});

describe('isInputKind', () => {
  it('should recognise the supported kinds only', () => {
    expect(isInputKind('array')).toBe(true);
    expect(isInputKind('size')).toBe(true);
    expect(isInputKind('matrix')).toBe(false);
    expect(isInputKind(3)).toBe(false);
  });
});
