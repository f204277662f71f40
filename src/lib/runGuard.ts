/**
 * Process-wide guard: only one paradigm run may be active at a time
 */

import { RunInProgressError } from './errors';

export class RunGuard {
  private static instance: RunGuard | null = null;
  private active: { label: string; token: symbol } | null = null;

  static getInstance(): RunGuard {
    if (!RunGuard.instance) {
      RunGuard.instance = new RunGuard();
    }
    return RunGuard.instance;
  }

  get activeRun(): string | null {
    return this.active?.label ?? null;
  }

  /** Returns a release function; releasing twice is harmless */
  acquire(label: string): () => void {
    if (this.active) throw new RunInProgressError(this.active.label);
    const token = Symbol(label);
    this.active = { label, token };
    return () => {
      if (this.active?.token === token) this.active = null;
    };
  }
}
