/**
 * RegistryEngine — community item registry with curator moderation.
 *
 * Lifecycle of an item:
 * - Any caller registers an item (unverified, active)
 * - A CURATOR overwrites the verified/active flags at will
 * - The submitter may deactivate its own item, once
 *
 * Ids are allocated from 0 and never reused. Items are never deleted;
 * existence is map membership.
 */

import type { Address } from "@concord/types";
import { itemStream } from "@concord/event-store";
import { AccountIndex, JournaledMap, LedgerError, Sequence } from "@concord/runtime";
import type { CallContext, Runtime } from "@concord/runtime";
import type { AccessControlLedger } from "@concord/access-control";
import type { RegistryItem } from "./types.js";

export class RegistryEngine {
  private readonly _ids: Sequence;
  private readonly _items: JournaledMap<number, RegistryItem>;
  private readonly _bySubmitter: AccountIndex;

  constructor(
    runtime: Runtime,
    private readonly access: AccessControlLedger,
  ) {
    this._ids = new Sequence(runtime.journal, 0);
    this._items = new JournaledMap(runtime.journal);
    this._bySubmitter = new AccountIndex(runtime.journal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Register a new item on behalf of the caller.
   *
   * @returns The new item's id
   * @throws LedgerError EMPTY_URI
   */
  registerItem(ctx: CallContext, uri: string, category: string): number {
    if (uri.length === 0) {
      throw new LedgerError("EMPTY_URI", "Item URI must not be empty");
    }

    const itemId = this._ids.next();
    this._items.set(itemId, {
      id: itemId,
      submitter: ctx.caller,
      uri,
      category,
      createdAt: ctx.timestamp,
      isVerified: false,
      isActive: true,
    });
    this._bySubmitter.append(ctx.caller, itemId);

    ctx.emit(itemStream(itemId), "registry.item.registered", {
      itemId,
      submitter: ctx.caller,
      uri,
      category,
      timestamp: ctx.timestamp,
    });
    return itemId;
  }

  /**
   * Overwrite both moderation flags. Curators may re-activate an item
   * its submitter deactivated.
   *
   * @throws LedgerError NOT_CURATOR or ITEM_NOT_FOUND
   */
  moderateItem(ctx: CallContext, itemId: number, verified: boolean, active: boolean): void {
    this.access.requireRole(ctx, "CURATOR", "NOT_CURATOR");
    const item = this._require(itemId);
    this._update(ctx, { ...item, isVerified: verified, isActive: active });
  }

  /**
   * Deactivate one of the caller's own items. Verification is kept.
   *
   * @throws LedgerError ITEM_NOT_FOUND, NOT_SUBMITTER or ALREADY_INACTIVE
   */
  deactivateOwnItem(ctx: CallContext, itemId: number): void {
    const item = this._require(itemId);
    if (item.submitter !== ctx.caller) {
      throw new LedgerError(
        "NOT_SUBMITTER",
        `Caller '${ctx.caller}' did not submit item ${itemId}`,
      );
    }
    if (!item.isActive) {
      throw new LedgerError("ALREADY_INACTIVE", `Item ${itemId} is already inactive`);
    }
    this._update(ctx, { ...item, isActive: false });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /** @throws LedgerError ITEM_NOT_FOUND */
  getItem(itemId: number): RegistryItem {
    return this._require(itemId);
  }

  /** Ids of items submitted by `account`, in submission order. */
  getItemsOf(account: Address): readonly number[] {
    return this._bySubmitter.list(account);
  }

  get itemCount(): number {
    return this._ids.allocated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private _require(itemId: number): RegistryItem {
    const item = this._items.get(itemId);
    if (item === undefined) {
      throw new LedgerError("ITEM_NOT_FOUND", `Item ${itemId} does not exist`);
    }
    return item;
  }

  private _update(ctx: CallContext, item: RegistryItem): void {
    this._items.set(item.id, item);
    ctx.emit(itemStream(item.id), "registry.item.status_updated", {
      itemId: item.id,
      isVerified: item.isVerified,
      isActive: item.isActive,
      timestamp: ctx.timestamp,
    });
  }
}
