/**
 * @quorumgate/types — Shared domain types for the QuorumGate stack.
 *
 * These types are used across all QuorumGate packages:
 * - Principals (addresses) and the null principal
 * - Transaction snapshots
 * - Wallet notifications
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Principal types
export type { Address } from "./address.js";
export { ZERO_ADDRESS, isZeroAddress } from "./address.js";

// Transaction types
export type { TransactionStatus, TransactionView } from "./transaction.js";

// Event types
export type {
  WalletEvent,
  WalletEventType,
  OwnerAddedEvent,
  DepositEvent,
  ProposedTransactionEvent,
  ApprovedTransactionEvent,
  AlreadyApprovedTransactionEvent,
  TransactionExecutedEvent,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isNonZeroAddress,
  isTransactionStatus,
  isTransactionView,
  isWalletEventType,
  isWalletEvent,
  isOwnerAddedEvent,
  isDepositEvent,
  isProposedTransactionEvent,
  isApprovedTransactionEvent,
  isAlreadyApprovedTransactionEvent,
  isTransactionExecutedEvent,
} from "./guards.js";
