/**
 * Transaction Types
 *
 * Read-side view of a proposed transfer. The engine keeps its own
 * mutable bookkeeping; callers only ever see these snapshots.
 */

import type { Address } from "./address.js";

/**
 * Lifecycle status derived from a transaction's approval count and flag.
 *
 * - proposed: no approvals yet
 * - approved: at least one approval, not executed
 * - executed: value released (terminal)
 */
export type TransactionStatus = "proposed" | "approved" | "executed";

/**
 * Snapshot of a proposed transfer.
 */
export interface TransactionView {
  /** Dense, zero-based proposal index */
  readonly id: number;

  /** Principal that receives the value */
  readonly recipient: Address;

  /** Amount in base units */
  readonly value: bigint;

  /** Number of distinct owners that approved */
  readonly approvalCount: number;

  /** Whether the value has been released */
  readonly executed: boolean;
}
