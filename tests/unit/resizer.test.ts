import { describe, it, expect } from 'vitest';
import { resizeArguments } from '../../src/lib/resizer/index.js';
import { locateSizableArgument } from '../../src/lib/locator/index.js';
import type { SizableArgument } from '../../src/types/timing.js';

describe('resizeArguments', () => {
  const values = Object.freeze([10, 20, 30, 40, 50, 60, 70, 80]);

  function locate(args: readonly unknown[]): SizableArgument {
    const located = locateSizableArgument(args, 3);
    if (!located) throw new Error('expected a sizable argument');
    return located;
  }

  it('should replace a sequence with its prefix', () => {
    const args = Object.freeze([3.5, values]);
    const resized = resizeArguments(args, locate(args), 3);

    expect(resized).toEqual([3.5, [10, 20, 30]]);
    expect(resized).not.toBe(args);
  });

  it('should leave the caller arguments untouched', () => {
    const args = Object.freeze([3.5, values]);
    resizeArguments(args, locate(args), 2);

    expect(args).toEqual([3.5, [10, 20, 30, 40, 50, 60, 70, 80]]);
    expect(values).toHaveLength(8);
  });

  it('should reproduce the original when resized to its own length', () => {
    const args = [values];
    const [resized] = resizeArguments(args, locate(args), values.length);

    expect(resized).toEqual(values);
    expect(resized).not.toBe(values);
  });

  it('should resize a leading string rather than a later array', () => {
    const args = ['label', values];
    expect(resizeArguments(args, locate(args), 3)).toEqual(['lab', values]);
  });

  it('should slice strings', () => {
    const args = ['abcdefgh'];
    expect(resizeArguments(args, locate(args), 4)).toEqual(['abcd']);
  });

  it('should substitute the target for a raw size', () => {
    const args = [3.5, 500];
    expect(resizeArguments(args, locate(args), 25)).toEqual([3.5, 25]);
    expect(args).toEqual([3.5, 500]);
  });

  it('should pass a value through when slicing throws', () => {
    const stubborn = {
      length: 10,
      slice: (): never => {
        throw new Error('not sliceable today');
      },
    };
    const args = [stubborn];
    const [resized] = resizeArguments(args, locate(args), 4);

    expect(resized).toBe(stubborn);
  });
});
