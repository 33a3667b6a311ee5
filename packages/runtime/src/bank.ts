/**
 * NativeBank — the execution environment's native value ledger.
 *
 * Balances are integers (bigint) per identity. Accounts may install a
 * TransferHook, which is how value transfers reach back into caller
 * code:
 *
 * - `onSend` runs before the sender is debited. It may call back into
 *   the runtime; guarded operations reject such re-entry.
 * - `onReceive` runs after the recipient is credited. Throwing rejects
 *   the transfer: the credit, the debit and anything the hook did are
 *   undone and the transfer fails with TRANSFER_REJECTED.
 *
 * Balance changes are journaled, so a failed call returns every balance
 * it touched.
 */

import type { Address } from "@concord/types";
import { LedgerError } from "./errors.js";
import type { Journal } from "./journal.js";
import { JournaledMap } from "./journal.js";

export interface Transfer {
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
}

export interface TransferHook {
  onSend?(transfer: Transfer): void;
  onReceive?(transfer: Transfer): void;
}

export class NativeBank {
  private readonly _balances: JournaledMap<Address, bigint>;
  private readonly _hooks = new Map<Address, TransferHook>();

  constructor(private readonly journal: Journal) {
    this._balances = new JournaledMap(journal);
  }

  balanceOf(account: Address): bigint {
    return this._balances.get(account) ?? 0n;
  }

  /** Credit new value to an account (genesis funding). */
  mint(account: Address, amount: bigint): void {
    assertAmount(amount);
    this._balances.set(account, this.balanceOf(account) + amount);
  }

  /** Install or clear the transfer hook for an account. */
  setHook(account: Address, hook: TransferHook | undefined): void {
    if (hook === undefined) {
      this._hooks.delete(account);
    } else {
      this._hooks.set(account, hook);
    }
  }

  /**
   * Move `amount` from one account to another.
   *
   * @throws LedgerError INVALID_AMOUNT, INSUFFICIENT_BALANCE or
   *   TRANSFER_REJECTED; errors thrown by the sender's hook propagate
   *   unchanged.
   */
  transfer(from: Address, to: Address, amount: bigint): void {
    assertAmount(amount);
    const transfer: Transfer = { from, to, amount };

    this._hooks.get(from)?.onSend?.(transfer);

    const available = this.balanceOf(from);
    if (available < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Account '${from}' holds ${available}, cannot transfer ${amount}`,
      );
    }

    const mark = this.journal.begin();
    try {
      this._balances.set(from, available - amount);
      this._balances.set(to, this.balanceOf(to) + amount);
      this._hooks.get(to)?.onReceive?.(transfer);
    } catch (err) {
      this.journal.rollback(mark);
      throw new LedgerError(
        "TRANSFER_REJECTED",
        `Account '${to}' rejected a transfer of ${amount}`,
        { cause: err },
      );
    }
    this.journal.commit();
  }
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must be >= 0, got ${amount}`);
  }
}
