/**
 * AccountIndex — append-only reverse index from an identity to ids.
 *
 * Used for discovery queries ("items submitted by", "documents to be
 * signed by"). Not authoritative: it could be rebuilt from the entity
 * maps, but is maintained incrementally so queries stay O(1).
 */

import type { Address } from "@concord/types";
import type { Journal } from "./journal.js";

export class AccountIndex {
  private readonly _ids = new Map<Address, number[]>();

  constructor(private readonly journal: Journal) {}

  append(account: Address, id: number): void {
    let ids = this._ids.get(account);
    if (ids === undefined) {
      ids = [];
      this._ids.set(account, ids);
    }
    const list = ids;
    list.push(id);
    this.journal.record(() => {
      list.pop();
      if (list.length === 0) {
        this._ids.delete(account);
      }
    });
  }

  /** Ids recorded for an account, in insertion order. */
  list(account: Address): readonly number[] {
    return [...(this._ids.get(account) ?? [])];
  }
}
