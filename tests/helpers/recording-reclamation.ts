/**
 * Reclamation control that records calls instead of touching the heap
 */

import type { ReclamationControl } from '../../src/types/config.js';

export class RecordingReclamation implements ReclamationControl {
  readonly calls: Array<'suspend' | 'resume'> = [];
  private suspended: boolean;

  constructor(initiallySuspended = false) {
    this.suspended = initiallySuspended;
  }

  isSuspended(): boolean {
    return this.suspended;
  }

  suspend(): void {
    this.calls.push('suspend');
    this.suspended = true;
  }

  resume(): void {
    this.calls.push('resume');
    this.suspended = false;
  }
}
