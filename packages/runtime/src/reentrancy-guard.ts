/**
 * ReentrancyGuard — rejects nested entry into a guarded region.
 *
 * The only explicit concurrency primitive the ledger needs: calls are
 * serialized, so the one way an operation can observe itself half-done
 * is a synchronous callback from a value transfer.
 */

import { LedgerError } from "./errors.js";

export class ReentrancyGuard {
  private _entered = false;

  constructor(private readonly name: string) {}

  get entered(): boolean {
    return this._entered;
  }

  enter<T>(fn: () => T): T {
    if (this._entered) {
      throw new LedgerError("REENTRANT_CALL", `Re-entrant call to ${this.name}`);
    }
    this._entered = true;
    try {
      return fn();
    } finally {
      this._entered = false;
    }
  }
}
