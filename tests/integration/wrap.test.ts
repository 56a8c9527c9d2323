/**
 * End-to-end behaviour of the function wrapper
 *
 * Operations charge a fixed, dyadic cost to a ManualClock so the sampled
 * per-call times are exact and model selection is deterministic.
 */

import { describe, it, expect } from 'vitest';
import { wrap } from '../../src/lib/timer/index.js';
import { ManualClock } from '../../src/lib/clock/index.js';
import { COMPLEXITY_LABELS } from '../../src/types/timing.js';
import { RecordingReclamation } from '../helpers/recording-reclamation.js';

const COST = 2 ** -20;

function setup() {
  const clock = new ManualClock();
  const reclamation = new RecordingReclamation();
  const lines: string[] = [];
  const write = (line: string) => {
    lines.push(line);
  };
  return { clock, reclamation, lines, runtime: { clock, reclamation, write } };
}

describe('wrap', () => {
  it('should return the original value for any analysis setting', () => {
    const { runtime } = setup();
    const answer = () => 42;

    expect(wrap(answer, { printResult: false }, runtime)().returnValue).toBe(42);
    expect(
      wrap(answer, { printResult: false, analyzeComplexity: true }, runtime)().returnValue,
    ).toBe(42);
  });

  it('should time a single call when analysis is disabled', () => {
    const { clock, lines, runtime } = setup();
    function slowThing(): string {
      clock.advance(0.25);
      return 'ok';
    }

    const result = wrap(slowThing, {}, runtime)();

    expect(result).toEqual({
      returnValue: 'ok',
      singleShotSeconds: 0.25,
      complexityLabel: 'not analyzed',
    });
    expect(lines).toEqual(['Elapsed (slowThing): 0.250000 seconds']);
  });

  it('should honour the label and name options', () => {
    const { lines, runtime } = setup();
    wrap(() => null, { label: 'Parse', name: 'parseHeader' }, runtime)();
    expect(lines).toEqual(['Parse (parseHeader): 0.000000 seconds']);
  });

  it('should select O(n) for a linear-time operation', () => {
    const { clock, reclamation, lines, runtime } = setup();
    function sumValues(values: number[]): number {
      clock.advance(COST * values.length);
      let total = 0;
      for (const value of values) total += value;
      return total;
    }
    const values = Array.from({ length: 2000 }, (_, i) => i + 1);

    const result = wrap(sumValues, { analyzeComplexity: true }, runtime)(values);

    expect(result.returnValue).toBe(2001000);
    expect(result.singleShotSeconds).toBe(2000 * COST);
    expect(result.complexityLabel).toBe('O(n)');
    expect(result.sampledSizes).toEqual([2, 6, 20, 63, 200, 632, 2000]);
    expect(result.perCallTimes).toEqual(
      [2, 6, 20, 63, 200, 632, 2000].map((size) => size * COST),
    );
    expect(result.modelErrors?.get('O(n)')).toBe(0);
    expect([...(result.modelErrors?.keys() ?? [])]).toEqual([...COMPLEXITY_LABELS]);
    expect(values).toHaveLength(2000);
    expect(reclamation.calls).toEqual(['suspend', 'resume']);
    expect(lines).toEqual(['Elapsed (sumValues): 0.001907 seconds, ~ O(n)']);
  });

  it('should select O(1) when the cost does not depend on size', () => {
    const { clock, runtime } = setup();
    const firstItem = (values: string) => {
      clock.advance(2 ** -10);
      return values[0];
    };

    const result = wrap(firstItem, { analyzeComplexity: true, printResult: false }, runtime)(
      'abcdefghijklmnopqrstuvwxyz',
    );

    expect(result.returnValue).toBe('a');
    expect(result.complexityLabel).toBe('O(1)');
    expect(result.modelErrors?.get('O(1)')).toBe(0);
  });

  it('should scale a raw size argument', () => {
    const { clock, runtime } = setup();
    const seen: number[] = [];
    const pairs = (n: number) => {
      seen.push(n);
      clock.advance(COST * n * n);
      return n * n;
    };

    const result = wrap(pairs, { analyzeComplexity: true, printResult: false }, runtime)(256);

    expect(result.returnValue).toBe(65536);
    expect(result.sampledSizes).toEqual([2, 4, 10, 23, 51, 114, 256]);
    expect(result.complexityLabel).toBe('O(n^2)');
    // Real call, then the warm-up at the smallest size
    expect(seen.slice(0, 2)).toEqual([256, 2]);
  });

  it('should use the argument named by sizeArgument', () => {
    const { clock, runtime } = setup();
    const repeat = (text: string, times: number) => {
      clock.advance(COST * times);
      return text.repeat(times).length;
    };

    const result = wrap(
      repeat,
      { analyzeComplexity: true, printResult: false, sizeArgument: 1 },
      runtime,
    )('abcdefghij', 64);

    expect(result.sampledSizes?.at(-1)).toBe(64);
    expect(result.complexityLabel).toBe('O(n)');
  });

  it('should report unknown complexity when no argument has a size', () => {
    const { lines, runtime } = setup();
    const double = (x: number) => x * 2;

    const result = wrap(double, { analyzeComplexity: true }, runtime)(3.5);

    expect(result).toEqual({
      returnValue: 7,
      singleShotSeconds: 0,
      complexityLabel: 'unknown',
    });
    expect(lines).toEqual(['Elapsed (double): 0.000000 seconds, ~ (size unknown)']);
  });

  it('should report unknown complexity when the input is smaller than the sample count', () => {
    const { runtime } = setup();
    const length = (values: number[]) => values.length;

    const result = wrap(length, { analyzeComplexity: true, printResult: false }, runtime)([1, 2, 3]);

    expect(result.complexityLabel).toBe('unknown');
    expect(result.returnValue).toBe(3);
  });

  it('should report unknown complexity for sequences without an integer length', () => {
    const { runtime } = setup();
    const constant = (_input: unknown) => 1;
    const timed = wrap(constant, { analyzeComplexity: true, printResult: false }, runtime);

    for (const length of [10.5, Number.NaN, Number.POSITIVE_INFINITY]) {
      const result = timed({ length, slice: () => [] });
      expect(result.complexityLabel).toBe('unknown');
      expect(result.returnValue).toBe(1);
    }
  });

  it('should propagate a failure of the real call unchanged', () => {
    const { lines, reclamation, runtime } = setup();
    const failure = new Error('first call fails');
    const explode = (_values: number[]): number => {
      throw failure;
    };

    let caught: unknown;
    let returned: unknown;
    try {
      returned = wrap(explode, { analyzeComplexity: true }, runtime)([1, 2, 3, 4, 5, 6, 7, 8]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBe(failure);
    expect(returned).toBeUndefined();
    expect(lines).toEqual([]);
    expect(reclamation.calls).toEqual([]);
  });

  it('should propagate a failure during sampling and restore reclamation', () => {
    const { clock, reclamation, lines, runtime } = setup();
    const failure = new Error('fails at size 6');
    const fragile = (values: number[]) => {
      clock.advance(COST);
      if (values.length === 6) throw failure;
      return values.length;
    };
    const values = Array.from({ length: 2000 }, (_, i) => i);

    expect(() => wrap(fragile, { analyzeComplexity: true }, runtime)(values)).toThrow(failure);
    expect(reclamation.calls).toEqual(['suspend', 'resume']);
    expect(reclamation.isSuspended()).toBe(false);
    expect(lines).toEqual([]);
  });

  it('should reject invalid options when wrapping', () => {
    expect(() => wrap(() => 1, { maxLoopsPerSize: 0 })).toThrow('Invalid timer options');
  });
});
