/**
 * Re-entrancy Guard
 *
 * A single flag shared by every balance-moving operation. While one of them is
 * running, any other guarded call fails REENTRANT_CALL, including calls made
 * from a payout recipient's hook.
 */

import { fail } from "./errors";

export class ReentrancyGuard {
  private active: string | undefined;

  get entered(): boolean {
    return this.active !== undefined;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this.active !== undefined) {
      fail("REENTRANT_CALL", `${operation} called while ${this.active} is in progress`, {
        operation,
        active: this.active,
      });
    }
    this.active = operation;
    try {
      return fn();
    } finally {
      this.active = undefined;
    }
  }
}
