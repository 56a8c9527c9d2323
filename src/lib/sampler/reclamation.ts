/**
 * Background memory reclamation control for sampling sweeps
 */

import type { ReclamationControl } from "../../types/config.js";
import { logger } from "../../utils/logger.js";

/**
 * V8 offers no switch to pause its collector from inside a running process.
 * Suspending instead runs a full collection up front when `gc` is exposed
 * (`node --expose-gc`), so a sweep starts from a settled heap; without it the
 * control only tracks state.
 */
class HeapReclamationControl implements ReclamationControl {
  private suspended = false;

  isSuspended(): boolean {
    return this.suspended;
  }

  suspend(): void {
    const gc: unknown = Reflect.get(globalThis, "gc");
    if (typeof gc === "function") {
      gc();
    }
    this.suspended = true;
  }

  resume(): void {
    this.suspended = false;
  }
}

export const heapReclamation: ReclamationControl = new HeapReclamationControl();

/**
 * Scoped hold on a reclamation control. Restores whatever state the control
 * was in before `acquire`, so guards nest.
 */
export class ReclamationGuard {
  private released = false;

  private constructor(
    private readonly control: ReclamationControl,
    private readonly wasSuspended: boolean,
  ) {}

  static acquire(control: ReclamationControl): ReclamationGuard {
    const wasSuspended = control.isSuspended();
    if (!wasSuspended) {
      control.suspend();
    }
    logger.debug("Background reclamation suspended", { wasSuspended });
    return new ReclamationGuard(control, wasSuspended);
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    if (!this.wasSuspended) {
      this.control.resume();
    }
  }
}
