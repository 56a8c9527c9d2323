import { describe, it, expect } from 'vitest';
import { ReclamationGuard, heapReclamation } from '../../src/lib/sampler/index.js';
import { RecordingReclamation } from '../helpers/recording-reclamation.js';

describe('ReclamationGuard', () => {
  it('should suspend on acquire and resume on release', () => {
    const control = new RecordingReclamation();
    const guard = ReclamationGuard.acquire(control);
    expect(control.isSuspended()).toBe(true);

    guard.release();
    expect(control.isSuspended()).toBe(false);
    expect(control.calls).toEqual(['suspend', 'resume']);
  });

  it('should release only once', () => {
    const control = new RecordingReclamation();
    const guard = ReclamationGuard.acquire(control);
    guard.release();
    guard.release();

    expect(control.calls).toEqual(['suspend', 'resume']);
  });

  it('should restore the outer state when nested', () => {
    const control = new RecordingReclamation();
    const outer = ReclamationGuard.acquire(control);
    const inner = ReclamationGuard.acquire(control);

    inner.release();
    expect(control.isSuspended()).toBe(true);

    outer.release();
    expect(control.isSuspended()).toBe(false);
    expect(control.calls).toEqual(['suspend', 'resume']);
  });
});

describe('heapReclamation', () => {
  it('should track its suspension state', () => {
    expect(heapReclamation.isSuspended()).toBe(false);
    heapReclamation.suspend();
    expect(heapReclamation.isSuspended()).toBe(true);
    heapReclamation.resume();
    expect(heapReclamation.isSuspended()).toBe(false);
  });
});
