/**
 * Reentrancy guard.
 *
 * Held for the full duration of an execution, including the window in
 * which the recipient runs. While held, every mutating entry point of
 * the wallet refuses to start.
 */

import type { MutatingOperation } from "./types.js";
import { WalletError } from "./types.js";

/**
 * Observer for refused calls.
 */
export type ReentrancyRejectedHandler = (
  operation: MutatingOperation,
  activeOperation: MutatingOperation,
) => void;

export class ReentrancyGuard {
  private active: MutatingOperation | null = null;

  constructor(private readonly onRejected?: ReentrancyRejectedHandler) {}

  get entered(): boolean {
    return this.active !== null;
  }

  /**
   * Run `fn` with the guard held. Released on every exit path.
   *
   * @throws WalletError REENTRANT_CALL if the guard is already held
   */
  run<T>(operation: MutatingOperation, fn: () => T): T {
    this.assertNotEntered(operation);
    this.active = operation;
    try {
      return fn();
    } finally {
      this.active = null;
    }
  }

  /**
   * @throws WalletError REENTRANT_CALL if the guard is held
   */
  assertNotEntered(operation: MutatingOperation): void {
    if (this.active !== null) {
      this.onRejected?.(operation, this.active);
      throw new WalletError(
        "REENTRANT_CALL",
        { operation, activeOperation: this.active },
        `Reentrant call to ${operation} during ${this.active}`,
      );
    }
  }
}
