/**
 * Runtime Type Guards
 *
 * Narrowing functions for wallet domain types.
 * These enable safe runtime validation at system boundaries
 * (configuration, deserialized data, observer callbacks).
 */

import type { Address } from "./address.js";
import { isZeroAddress } from "./address.js";
import type {
  WalletEvent,
  WalletEventType,
  OwnerAddedEvent,
  DepositEvent,
  ProposedTransactionEvent,
  ApprovedTransactionEvent,
  AlreadyApprovedTransactionEvent,
  TransactionExecutedEvent,
} from "./event.js";
import type { TransactionStatus, TransactionView } from "./transaction.js";

// =============================================================================
// Principal guards
// =============================================================================

export function isAddress(value: unknown): value is Address {
  return typeof value === "string";
}

/**
 * A string that is not the null principal.
 */
export function isNonZeroAddress(value: unknown): value is Address {
  return isAddress(value) && !isZeroAddress(value);
}

// =============================================================================
// Transaction guards
// =============================================================================

const TRANSACTION_STATUSES = new Set<string>(["proposed", "approved", "executed"]);

export function isTransactionStatus(value: unknown): value is TransactionStatus {
  return typeof value === "string" && TRANSACTION_STATUSES.has(value);
}

function isTransactionId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

export function isTransactionView(value: unknown): value is TransactionView {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isTransactionId(v.id) &&
    isAddress(v.recipient) &&
    typeof v.value === "bigint" &&
    v.value >= 0n &&
    typeof v.approvalCount === "number" &&
    Number.isInteger(v.approvalCount) &&
    v.approvalCount >= 0 &&
    typeof v.executed === "boolean"
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_TYPES = new Set<string>([
  "owner_added",
  "deposit",
  "proposed_transaction",
  "approved_transaction",
  "already_approved_transaction",
  "transaction_executed",
]);

export function isWalletEventType(value: unknown): value is WalletEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

export function isWalletEvent(value: unknown): value is WalletEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;

  switch (v.type) {
    case "owner_added":
      return isAddress(v.owner);
    case "deposit":
      return isAddress(v.sender) && typeof v.amount === "bigint";
    case "proposed_transaction":
      return (
        isTransactionId(v.id) &&
        isAddress(v.proposer) &&
        isAddress(v.recipient) &&
        typeof v.value === "bigint"
      );
    case "approved_transaction":
    case "already_approved_transaction":
      return isTransactionId(v.id) && isAddress(v.approver);
    case "transaction_executed":
      return isTransactionId(v.id) && isAddress(v.executor);
    default:
      return false;
  }
}

export function isOwnerAddedEvent(e: WalletEvent): e is OwnerAddedEvent {
  return e.type === "owner_added";
}

export function isDepositEvent(e: WalletEvent): e is DepositEvent {
  return e.type === "deposit";
}

export function isProposedTransactionEvent(e: WalletEvent): e is ProposedTransactionEvent {
  return e.type === "proposed_transaction";
}

export function isApprovedTransactionEvent(e: WalletEvent): e is ApprovedTransactionEvent {
  return e.type === "approved_transaction";
}

export function isAlreadyApprovedTransactionEvent(
  e: WalletEvent,
): e is AlreadyApprovedTransactionEvent {
  return e.type === "already_approved_transaction";
}

export function isTransactionExecutedEvent(e: WalletEvent): e is TransactionExecutedEvent {
  return e.type === "transaction_executed";
}
