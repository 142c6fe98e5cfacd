/**
 * Bounded counter for long-lived, session-based tools (interactive terminals).
 *
 * Operations are synchronous, so acquire and release are atomic on the event loop.
 */

import { ResourceExhaustedError } from '../errors.js';

export interface SessionLease {
  /** Return the slot. Calling it more than once has no further effect. */
  release(): void;
  readonly released: boolean;
}

export interface SessionGuardOptions {
  maxSessions: number;
  /** When false every acquire fails (default: true) */
  enabled?: boolean | undefined;
  /** Resource name used in error messages (default: 'PTY sessions') */
  resource?: string | undefined;
}

export class SessionConcurrencyGuard {
  readonly maxAllowed: number;
  readonly enabled: boolean;
  private readonly resource: string;
  private activeCount = 0;

  constructor(options: SessionGuardOptions) {
    if (!Number.isInteger(options.maxSessions) || options.maxSessions < 0) {
      throw new RangeError(`maxSessions must be a non-negative integer, got ${String(options.maxSessions)}`);
    }
    this.maxAllowed = options.maxSessions;
    this.enabled = options.enabled ?? true;
    this.resource = options.resource ?? 'PTY sessions';
  }

  get active(): number {
    return this.activeCount;
  }

  get available(): number {
    return this.enabled ? this.maxAllowed - this.activeCount : 0;
  }

  canStart(): boolean {
    return this.enabled && this.activeCount < this.maxAllowed;
  }

  /** Take a slot if one is free. */
  tryAcquire(): boolean {
    if (!this.canStart()) {
      return false;
    }
    this.activeCount++;
    return true;
  }

  /**
   * Take a slot and get a lease for it.
   * @throws ResourceExhaustedError when every slot is taken or the guard is disabled
   */
  acquire(): SessionLease {
    if (!this.tryAcquire()) {
      throw new ResourceExhaustedError(this.resource, this.enabled ? this.maxAllowed : 0, this.activeCount);
    }

    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.release();
      },
      get released() {
        return released;
      },
    };
  }

  /** Give back a slot. A no-op when nothing is held. */
  release(): void {
    if (this.activeCount > 0) {
      this.activeCount--;
    }
  }
}
