/**
 * @quorumgate/wallet — Types for the transaction ledger and execution engine.
 *
 * Rules:
 * - Every failure is a thrown WalletError carrying structured details
 * - A failed operation leaves no state change behind
 * - The only non-error rejection is a repeated approval, reported
 *   through the already_approved_transaction notification
 */

import type { Logger } from "pino";
import type { EventStore } from "@quorumgate/event-store";
import type { TransferFailureReason, ValueTransfer } from "@quorumgate/pool";
import type { Address, WalletEvent } from "@quorumgate/types";

// =============================================================================
// Options
// =============================================================================

/**
 * Options for constructing a MultiSigWallet.
 */
export interface WalletOptions {
  /** The wallet's own account in the pool; also its event stream ID */
  readonly address: Address;

  /** Owners in enumeration order */
  readonly owners: readonly Address[];

  /** Quorum threshold */
  readonly requiredApprovals: number;

  /** Substrate value is deposited into and released through; watched for receipts */
  readonly pool: ValueTransfer;

  /** Structured logger. Default: silent */
  readonly logger?: Logger;

  /**
   * Where notifications are recorded. Default: a private in-memory store.
   * Whatever the store, an operation that has committed is never failed
   * or undone by a throwing subscriber; the error is logged instead.
   */
  readonly eventStore?: EventStore<WalletEvent>;
}

/**
 * Operations that change wallet or pool state.
 */
export type MutatingOperation = "propose" | "approve" | "execute" | "deposit";

// =============================================================================
// Errors
// =============================================================================

/**
 * Structured data carried by each wallet error code.
 */
export interface WalletErrorDetails {
  readonly ZERO_ADDRESS_WALLET: Readonly<Record<string, never>>;
  readonly NOT_OWNER: { readonly caller: Address };
  readonly ZERO_ADDRESS_RECIPIENT: Readonly<Record<string, never>>;
  readonly INVALID_VALUE: { readonly value: bigint };
  readonly INVALID_TRANSACTION_NONCE: { readonly id: number };
  readonly TRANSACTION_ALREADY_EXECUTED: { readonly id: number };
  readonly NOT_ENOUGH_APPROVALS: {
    readonly id: number;
    readonly approvalCount: number;
    readonly requiredApprovals: number;
  };
  readonly TRANSFER_FAILED: {
    readonly id: number;
    readonly recipient: Address;
    readonly value: bigint;
    readonly reason: TransferFailureReason;
  };
  readonly DEPOSIT_FAILED: {
    readonly sender: Address;
    readonly amount: bigint;
    readonly reason: TransferFailureReason;
  };
  readonly REENTRANT_CALL: {
    readonly operation: MutatingOperation;
    readonly activeOperation: MutatingOperation;
  };
}

/** Error codes for wallet operations. */
export type WalletErrorCode = keyof WalletErrorDetails;

/**
 * Structured error from the wallet engine.
 */
export class WalletError<
  C extends WalletErrorCode = WalletErrorCode,
> extends Error {
  public readonly code: C;
  public readonly details: WalletErrorDetails[C];

  constructor(
    code: C,
    details: WalletErrorDetails[C],
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "WalletError";
    this.code = code;
    this.details = details;
  }
}
