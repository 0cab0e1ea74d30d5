/**
 * Wallet Notification Types
 *
 * Every observable state change of a wallet is captured as a WalletEvent.
 * Notifications are emitted exactly once per triggering change, in order.
 *
 * Rules:
 * - Events are immutable after creation
 * - Discriminated by `type`
 * - Amounts are bigint in base units of the pooled asset
 */

import type { Address } from "./address.js";

/**
 * Discriminated union of all wallet notifications.
 */
export type WalletEvent =
  | OwnerAddedEvent
  | DepositEvent
  | ProposedTransactionEvent
  | ApprovedTransactionEvent
  | AlreadyApprovedTransactionEvent
  | TransactionExecutedEvent;

/** Notification type identifiers. */
export type WalletEventType = WalletEvent["type"];

export interface OwnerAddedEvent {
  readonly type: "owner_added";
  readonly owner: Address;
}

/**
 * Value received into the pool outside of execution.
 */
export interface DepositEvent {
  readonly type: "deposit";
  readonly sender: Address;
  readonly amount: bigint;
}

export interface ProposedTransactionEvent {
  readonly type: "proposed_transaction";
  readonly id: number;
  readonly proposer: Address;
  readonly recipient: Address;
  readonly value: bigint;
}

export interface ApprovedTransactionEvent {
  readonly type: "approved_transaction";
  readonly id: number;
  readonly approver: Address;
}

/**
 * Emitted instead of an error when an owner re-approves.
 */
export interface AlreadyApprovedTransactionEvent {
  readonly type: "already_approved_transaction";
  readonly id: number;
  readonly approver: Address;
}

export interface TransactionExecutedEvent {
  readonly type: "transaction_executed";
  readonly id: number;
  readonly executor: Address;
}
