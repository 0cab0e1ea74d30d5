/**
 * @quorumgate/pool — In-memory balance book.
 *
 * Single-asset account balances with hook-aware transfers.
 *
 * API surface:
 * - mint() — Create value in an account (seeding only)
 * - transfer() — Move value between accounts, all-or-nothing
 * - balanceOf() / totalSupply() — Queries
 * - setRecipientHook() / clearRecipientHook() — Code that runs on receipt
 * - watchReceipts() — Observe committed receipts into an account
 *
 * A transfer takes a checkpoint of every balance before moving value.
 * If the recipient hook refuses or throws, the checkpoint is restored,
 * which also undoes anything the hook itself moved in the meantime.
 * Receipts are queued while hooks run and delivered to watchers only
 * when the outermost transfer commits.
 */

import type { Address } from "@quorumgate/types";
import { isZeroAddress } from "@quorumgate/types";
import type {
  Receipt,
  ReceiptListener,
  ReceiptSubscription,
  RecipientHook,
  TransferOutcome,
  ValueTransfer,
} from "./types.js";
import { PoolError } from "./types.js";

export class BalanceBook implements ValueTransfer {
  private _balances: Map<Address, bigint> = new Map();
  private readonly _hooks: Map<Address, RecipientHook> = new Map();
  private readonly _watchers: Map<Address, Set<ReceiptListener>> = new Map();

  /** Receipts committed inside a running hook, not yet delivered */
  private readonly _pending: Receipt[] = [];

  /** Number of recipient hooks currently running */
  private _hookDepth = 0;

  // ─── Setup ───────────────────────────────────────────────────────────

  /**
   * Create `amount` of value in `account`.
   * Throws PoolError for a negative amount or the null principal.
   */
  mint(account: Address, amount: bigint): void {
    if (isZeroAddress(account)) {
      throw new PoolError("ZERO_ADDRESS_ACCOUNT", "Cannot mint to the null principal");
    }
    if (amount < 0n) {
      throw new PoolError(
        "INVALID_AMOUNT",
        `Mint amount must be non-negative, got ${amount.toString()}`,
      );
    }
    this._balances.set(account, this.balanceOf(account) + amount);
  }

  /**
   * Register code to run whenever `account` receives value.
   * Replaces any existing hook.
   */
  setRecipientHook(account: Address, hook: RecipientHook): void {
    this._hooks.set(account, hook);
  }

  clearRecipientHook(account: Address): void {
    this._hooks.delete(account);
  }

  watchReceipts(account: Address, listener: ReceiptListener): ReceiptSubscription {
    const listeners = this._watchers.get(account) ?? new Set<ReceiptListener>();
    this._watchers.set(account, listeners);
    listeners.add(listener);

    return {
      unsubscribe: () => {
        listeners.delete(listener);
        if (listeners.size === 0) {
          this._watchers.delete(account);
        }
      },
    };
  }

  // ─── Transfer ────────────────────────────────────────────────────────

  transfer(from: Address, to: Address, amount: bigint): TransferOutcome {
    if (amount < 0n) {
      return { ok: false, reason: "INVALID_AMOUNT" };
    }
    if (isZeroAddress(to)) {
      return { ok: false, reason: "INVALID_RECIPIENT" };
    }
    if (this.balanceOf(from) < amount) {
      return { ok: false, reason: "INSUFFICIENT_BALANCE" };
    }

    const checkpoint = new Map(this._balances);
    const pendingMark = this._pending.length;
    const receipt: Receipt = { from, to, amount };

    this._balances.set(from, this.balanceOf(from) - amount);
    this._balances.set(to, this.balanceOf(to) + amount);

    const hook = this._hooks.get(to);
    if (hook !== undefined) {
      let accepted: boolean;
      this._hookDepth++;
      try {
        accepted = hook(receipt);
      } catch (error: unknown) {
        this._rollback(checkpoint, pendingMark);
        return { ok: false, reason: "RECIPIENT_ERROR", error };
      } finally {
        this._hookDepth--;
      }

      if (!accepted) {
        this._rollback(checkpoint, pendingMark);
        return { ok: false, reason: "RECIPIENT_REJECTED" };
      }
    }

    this._pending.push(receipt);
    if (this._hookDepth === 0) {
      this._deliverPending();
    }
    return { ok: true };
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(account: Address): bigint {
    return this._balances.get(account) ?? 0n;
  }

  /**
   * Sum of all balances. Unchanged by transfers.
   */
  totalSupply(): bigint {
    let total = 0n;
    for (const balance of this._balances.values()) {
      total += balance;
    }
    return total;
  }

  /**
   * All accounts holding a non-zero balance.
   */
  getBalances(): ReadonlyMap<Address, bigint> {
    return new Map([...this._balances].filter(([, balance]) => balance !== 0n));
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _rollback(checkpoint: Map<Address, bigint>, pendingMark: number): void {
    this._balances = checkpoint;
    this._pending.length = pendingMark;
  }

  private _deliverPending(): void {
    const receipts = this._pending.splice(0);
    for (const receipt of receipts) {
      for (const listener of [...(this._watchers.get(receipt.to) ?? [])]) {
        listener(receipt);
      }
    }
  }
}
