/**
 * @quorumgate/pool — Single-asset value substrate.
 *
 * Supplies the ValueTransfer port the wallet engine releases value
 * through, plus an in-memory BalanceBook implementation.
 *
 * Design rules:
 * - All monetary arithmetic uses bigint (no floating point)
 * - Transfers are all-or-nothing, including nested hook activity
 * - Transfer failures are outcomes, not exceptions
 */

export { BalanceBook } from "./balance-book.js";

export type {
  TransferFailureReason,
  TransferOutcome,
  ValueTransfer,
  Receipt,
  RecipientHook,
  ReceiptListener,
  ReceiptSubscription,
  PoolErrorCode,
} from "./types.js";

export { PoolError } from "./types.js";
