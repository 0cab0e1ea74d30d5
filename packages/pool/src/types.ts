/**
 * @quorumgate/pool — Types for the value substrate.
 *
 * The wallet engine only needs one capability from the substrate:
 * "move V from account A to account B, reporting success or failure".
 * That capability is the ValueTransfer port below.
 *
 * Rules:
 * - Amounts are non-negative bigint base units of a single asset
 * - A failed transfer never leaves a partial balance change behind
 * - Transfer failures are reported as outcomes, never thrown
 */

import type { Address } from "@quorumgate/types";

// ─── Transfer Port ───────────────────────────────────────────────────────

/** Why a transfer did not happen. */
export type TransferFailureReason =
  | "INVALID_AMOUNT"
  | "INVALID_RECIPIENT"
  | "INSUFFICIENT_BALANCE"
  | "RECIPIENT_REJECTED"
  | "RECIPIENT_ERROR";

/**
 * Result of a transfer attempt.
 * `error` is set when a recipient hook threw.
 */
export type TransferOutcome =
  | { readonly ok: true }
  | {
      readonly ok: false;
      readonly reason: TransferFailureReason;
      readonly error?: unknown;
    };

/**
 * The capability the execution engine depends on.
 */
export interface ValueTransfer {
  /** Current balance of an account (0 for unknown accounts). */
  balanceOf(account: Address): bigint;

  /**
   * Move `amount` from `from` to `to`.
   * Either the whole movement happens or none of it does.
   */
  transfer(from: Address, to: Address, amount: bigint): TransferOutcome;

  /**
   * Be told of every committed receipt into `account`, whoever initiated it.
   * Delivery happens once the outermost transfer has committed, so value
   * that is later rolled back is never reported.
   */
  watchReceipts(account: Address, listener: ReceiptListener): ReceiptSubscription;
}

// ─── Recipient Hooks ─────────────────────────────────────────────────────

/**
 * Notice handed to a recipient when value arrives.
 */
export interface Receipt {
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
}

/**
 * Code an account runs on receipt of value.
 *
 * Return `false` to refuse the value. Throwing also refuses it.
 * The hook runs after balances are updated, so it may spend what it
 * received or call into other components.
 */
export type RecipientHook = (receipt: Receipt) => boolean;

/**
 * Observer of committed receipts. Must not throw: it runs after the
 * value has moved, and an exception escapes the transfer that
 * delivered it.
 */
export type ReceiptListener = (receipt: Receipt) => void;

export interface ReceiptSubscription {
  unsubscribe(): void;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for direct (non-transfer) pool operations. */
export type PoolErrorCode = "INVALID_AMOUNT" | "ZERO_ADDRESS_ACCOUNT";

/**
 * Structured error from the pool.
 * Thrown only by setup operations such as mint(); transfers report outcomes.
 */
export class PoolError extends Error {
  public readonly code: PoolErrorCode;

  constructor(code: PoolErrorCode, message: string) {
    super(message);
    this.name = "PoolError";
    this.code = code;
  }
}
