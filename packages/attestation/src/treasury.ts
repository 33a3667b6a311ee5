/**
 * FeeTreasury — storage fee parameter and collected fees.
 *
 * The collected balance is not a counter kept here: it is the native
 * balance of the treasury's own account in the runtime bank. Deposits
 * and withdrawals are plain bank transfers, so a rejected withdrawal is
 * undone by the bank and nothing here can drift out of step.
 */

import { TREASURY_ACCOUNT } from "@concord/types";
import type { Address } from "@concord/types";
import { JournaledValue, LedgerError, ReentrancyGuard } from "@concord/runtime";
import type { CallContext, NativeBank, Runtime } from "@concord/runtime";
import type { OwnerSource } from "./types.js";

export { TREASURY_ACCOUNT };

export interface FeeTreasuryOptions {
  /** Fee required to create a document. Default: 0 */
  readonly initialFee?: bigint;
}

export class FeeTreasury {
  readonly account: Address = TREASURY_ACCOUNT;
  private readonly _bank: NativeBank;
  private readonly _fee: JournaledValue<bigint>;
  private readonly _withdrawGuard = new ReentrancyGuard("withdrawFees");

  constructor(
    runtime: Runtime,
    private readonly ownership: OwnerSource,
    options: FeeTreasuryOptions = {},
  ) {
    const initialFee = options.initialFee ?? 0n;
    assertFee(initialFee);
    this._bank = runtime.bank;
    this._fee = new JournaledValue(runtime.journal, initialFee);
  }

  get storageFee(): bigint {
    return this._fee.get();
  }

  /** Fees collected and not yet withdrawn. */
  get balance(): bigint {
    return this._bank.balanceOf(this.account);
  }

  /**
   * Change the fee for subsequent document creations.
   *
   * @throws LedgerError NOT_OWNER or INVALID_AMOUNT
   */
  setStorageFee(ctx: CallContext, newFee: bigint): void {
    this._requireOwner(ctx);
    assertFee(newFee);
    this._fee.set(newFee);
  }

  /**
   * Collect the value attached to the current call from its caller.
   * Runs the caller's send hook, which may attempt re-entry.
   */
  deposit(ctx: CallContext): void {
    this._bank.transfer(ctx.caller, this.account, ctx.value);
  }

  /**
   * Send the whole balance to the owner.
   *
   * @returns The amount withdrawn
   * @throws LedgerError NOT_OWNER, REENTRANT_CALL or TRANSFER_REJECTED
   */
  withdrawFees(ctx: CallContext): bigint {
    this._requireOwner(ctx);
    return this._withdrawGuard.enter(() => {
      const amount = this.balance;
      this._bank.transfer(this.account, ctx.caller, amount);
      return amount;
    });
  }

  private _requireOwner(ctx: CallContext): void {
    if (ctx.caller !== this.ownership.owner) {
      throw new LedgerError("NOT_OWNER", `Caller '${ctx.caller}' is not the owner`);
    }
  }
}

function assertFee(fee: bigint): void {
  if (fee < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Storage fee must be >= 0, got ${fee}`);
  }
}
