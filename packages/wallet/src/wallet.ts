/**
 * MultiSigWallet — n-of-m approval gate over a shared pool of value.
 *
 * Manages the Propose → Approve (k times) → Execute flow for every
 * outgoing transfer.
 *
 * Rules:
 * - Only owners may propose, approve or execute
 * - Transactions are append-only: ids are dense, never reused, never deleted
 * - Approval is idempotent per owner and never triggers execution
 * - Execution marks the transaction executed before releasing value and
 *   restores the flag if the release fails
 * - While an execution is in flight no mutating call may start
 * - A failing notification subscriber is logged and never undoes or fails
 *   the operation that notified it
 * - Every committed receipt into the wallet account from elsewhere is a deposit
 */

import { pino } from "pino";
import type { Logger } from "pino";
import type {
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  Subscription,
} from "@quorumgate/event-store";
import { InMemoryEventStore } from "@quorumgate/event-store";
import type { Receipt, ValueTransfer } from "@quorumgate/pool";
import { OwnerRegistry } from "@quorumgate/registry";
import type {
  Address,
  TransactionStatus,
  TransactionView,
  WalletEvent,
} from "@quorumgate/types";
import { isZeroAddress } from "@quorumgate/types";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import type { WalletOptions } from "./types.js";
import { WalletError } from "./types.js";

// =============================================================================
// Internal record
// =============================================================================

interface TransactionRecord {
  readonly id: number;
  readonly recipient: Address;
  readonly value: bigint;
  /** Approving owners in approval order */
  readonly approvals: Set<Address>;
  executed: boolean;
}

function toView(tx: TransactionRecord): TransactionView {
  return {
    id: tx.id,
    recipient: tx.recipient,
    value: tx.value,
    approvalCount: tx.approvals.size,
    executed: tx.executed,
  };
}

/**
 * Lifecycle status of a transaction snapshot.
 */
export function transactionStatus(tx: TransactionView): TransactionStatus {
  if (tx.executed) return "executed";
  return tx.approvalCount > 0 ? "approved" : "proposed";
}

// =============================================================================
// Wallet
// =============================================================================

export class MultiSigWallet {
  readonly address: Address;

  private readonly registry: OwnerRegistry;
  private readonly transactions: TransactionRecord[] = [];
  private readonly guard = new ReentrancyGuard((operation, activeOperation) => {
    this.logger.warn({ operation, activeOperation }, "Reentrant call rejected");
  });
  private readonly pool: ValueTransfer;
  private readonly events: EventStore<WalletEvent>;
  private readonly logger: Logger;

  /**
   * @throws WalletError ZERO_ADDRESS_WALLET if `address` is the null principal
   * @throws RegistryError for an invalid owner list or threshold
   */
  constructor(options: WalletOptions) {
    if (isZeroAddress(options.address)) {
      throw new WalletError(
        "ZERO_ADDRESS_WALLET",
        {},
        "Wallet address must not be the null principal",
      );
    }

    this.address = options.address;
    this.pool = options.pool;
    this.logger = (options.logger ?? pino({ level: "silent" })).child({
      wallet: options.address,
    });
    this.events =
      options.eventStore ??
      new InMemoryEventStore<WalletEvent>({
        onSubscriberError: (error, stored) => {
          this.logger.error(
            { err: error, position: stored.globalPosition, type: stored.event.type },
            "Wallet event subscriber failed",
          );
        },
      });

    const added: WalletEvent[] = [];
    this.registry = new OwnerRegistry(options.owners, options.requiredApprovals, {
      onOwnerAdded: (owner) => added.push({ type: "owner_added", owner }),
    });
    for (const event of added) {
      this.emit(event);
    }

    this.pool.watchReceipts(this.address, (receipt) => this.recordDeposit(receipt));

    this.logger.info(
      { owners: this.registry.listOwners(), requiredApprovals: this.registry.requiredApprovals },
      "Wallet created",
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Propose a transfer of `value` to `recipient`.
   *
   * The proposer is not counted as an approver, and the pool balance is
   * not checked until execution.
   *
   * @returns The new transaction's id
   */
  propose(caller: Address, recipient: Address, value: bigint): number {
    this.guard.assertNotEntered("propose");
    this.assertOwner(caller);

    if (isZeroAddress(recipient)) {
      throw new WalletError(
        "ZERO_ADDRESS_RECIPIENT",
        {},
        "Recipient must not be the null principal",
      );
    }
    if (value < 0n) {
      throw new WalletError(
        "INVALID_VALUE",
        { value },
        `Value must be non-negative, got ${value.toString()}`,
      );
    }

    const id = this.transactions.length;
    this.transactions.push({
      id,
      recipient,
      value,
      approvals: new Set(),
      executed: false,
    });

    this.emit({ type: "proposed_transaction", id, proposer: caller, recipient, value });
    this.logger.info(
      { id, proposer: caller, recipient, value: value.toString() },
      "Transaction proposed",
    );
    return id;
  }

  /**
   * Record `caller`'s approval of transaction `id`.
   *
   * Check order: owner, existence, already approved (no-op with
   * notification), already executed, then record.
   */
  approve(caller: Address, id: number): void {
    this.guard.assertNotEntered("approve");
    this.assertOwner(caller);
    const tx = this.requireTransaction(id);

    if (tx.approvals.has(caller)) {
      this.emit({ type: "already_approved_transaction", id, approver: caller });
      this.logger.debug({ id, approver: caller }, "Transaction already approved");
      return;
    }

    if (tx.executed) {
      throw new WalletError(
        "TRANSACTION_ALREADY_EXECUTED",
        { id },
        `Transaction ${id} already executed`,
      );
    }

    tx.approvals.add(caller);
    this.emit({ type: "approved_transaction", id, approver: caller });
    this.logger.info(
      { id, approver: caller, approvalCount: tx.approvals.size },
      "Transaction approved",
    );
  }

  /**
   * Release the value of transaction `id` to its recipient once quorum is met.
   *
   * Either the value moves, the transaction stays executed and
   * transaction_executed is emitted, or nothing changes and the call throws.
   */
  execute(caller: Address, id: number): void {
    this.guard.run("execute", () => {
      this.assertOwner(caller);
      const tx = this.requireTransaction(id);

      if (tx.executed) {
        throw new WalletError(
          "TRANSACTION_ALREADY_EXECUTED",
          { id },
          `Transaction ${id} already executed`,
        );
      }

      const approvalCount = tx.approvals.size;
      const requiredApprovals = this.registry.requiredApprovals;
      if (approvalCount < requiredApprovals) {
        throw new WalletError(
          "NOT_ENOUGH_APPROVALS",
          { id, approvalCount, requiredApprovals },
          `Transaction ${id} has ${approvalCount} of ${requiredApprovals} required approvals`,
        );
      }

      // Commit before handing control to the recipient
      tx.executed = true;
      const outcome = this.pool.transfer(this.address, tx.recipient, tx.value);

      if (!outcome.ok) {
        tx.executed = false;
        this.logger.warn(
          { id, recipient: tx.recipient, value: tx.value.toString(), reason: outcome.reason },
          "Transfer failed",
        );
        throw new WalletError(
          "TRANSFER_FAILED",
          { id, recipient: tx.recipient, value: tx.value, reason: outcome.reason },
          `Transfer for transaction ${id} failed: ${outcome.reason}`,
          { cause: outcome.error },
        );
      }

      this.emit({ type: "transaction_executed", id, executor: caller });
      this.logger.info(
        { id, executor: caller, recipient: tx.recipient, value: tx.value.toString() },
        "Transaction executed",
      );
    });
  }

  /**
   * Move `amount` from `sender` into the pool.
   *
   * The deposit notification comes from the receipt watcher, as it does
   * for value sent to the wallet account directly.
   */
  deposit(sender: Address, amount: bigint): void {
    this.guard.assertNotEntered("deposit");

    if (amount < 0n) {
      throw new WalletError(
        "INVALID_VALUE",
        { value: amount },
        `Deposit amount must be non-negative, got ${amount.toString()}`,
      );
    }

    const outcome = this.pool.transfer(sender, this.address, amount);
    if (!outcome.ok) {
      throw new WalletError(
        "DEPOSIT_FAILED",
        { sender, amount, reason: outcome.reason },
        `Deposit from ${sender} failed: ${outcome.reason}`,
        { cause: outcome.error },
      );
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  isOwner(principal: Address): boolean {
    return this.registry.isOwner(principal);
  }

  listOwners(): Address[] {
    return this.registry.listOwners();
  }

  getRequiredApprovals(): number {
    return this.registry.requiredApprovals;
  }

  /**
   * Whether `principal` approved transaction `id`. False for unknown ids.
   */
  hasApproved(id: number, principal: Address): boolean {
    return this.findTransaction(id)?.approvals.has(principal) ?? false;
  }

  /**
   * @throws WalletError INVALID_TRANSACTION_NONCE for unknown ids
   */
  getTransaction(id: number): TransactionView {
    return toView(this.requireTransaction(id));
  }

  /**
   * Owners that approved transaction `id`, in approval order.
   */
  getApprovers(id: number): Address[] {
    return [...this.requireTransaction(id).approvals];
  }

  getTransactionCount(): number {
    return this.transactions.length;
  }

  /**
   * All transactions in id order, optionally filtered by status.
   */
  listTransactions(status?: TransactionStatus): TransactionView[] {
    const all = this.transactions.map(toView);
    return status ? all.filter((tx) => transactionStatus(tx) === status) : all;
  }

  /**
   * Current pool balance.
   */
  getBalance(): bigint {
    return this.pool.balanceOf(this.address);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Notifications
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Every notification this wallet emitted, in order.
   */
  getEventHistory(): WalletEvent[] {
    return this.events.read(this.address).map((stored) => stored.event);
  }

  /**
   * Receive each future notification synchronously, in order.
   */
  subscribe(handler: EventHandler<WalletEvent>): Subscription {
    return this.events.subscribe(this.address, handler);
  }

  verifyEventLog(): EventStoreIntegrityResult {
    return this.events.verifyIntegrity();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private emit(event: WalletEvent): void {
    try {
      this.events.append(this.address, [event]);
    } catch (error: unknown) {
      this.logger.error({ err: error, type: event.type }, "Wallet event subscriber failed");
    }
  }

  private recordDeposit(receipt: Receipt): void {
    // Zero-value and self receipts carry no new value
    if (receipt.amount === 0n || receipt.from === this.address) return;

    this.emit({ type: "deposit", sender: receipt.from, amount: receipt.amount });
    this.logger.info(
      { sender: receipt.from, amount: receipt.amount.toString() },
      "Deposit received",
    );
  }

  private assertOwner(caller: Address): void {
    if (!this.registry.isOwner(caller)) {
      throw new WalletError("NOT_OWNER", { caller }, `Not an owner: "${caller}"`);
    }
  }

  private findTransaction(id: number): TransactionRecord | undefined {
    return Number.isInteger(id) ? this.transactions[id] : undefined;
  }

  private requireTransaction(id: number): TransactionRecord {
    const tx = this.findTransaction(id);
    if (tx === undefined) {
      throw new WalletError(
        "INVALID_TRANSACTION_NONCE",
        { id },
        `Transaction ${id} does not exist`,
      );
    }
    return tx;
  }
}
