/**
 * AccessControlLedger — role grants and contract ownership.
 *
 * Two independent authority axes:
 * - Roles: (account, role) grants administered by ADMIN holders
 * - Ownership: a single owner identity, transferable only by itself
 *
 * Transferring ownership never touches role grants, and granting or
 * revoking ADMIN never touches ownership. The initial owner starts out
 * holding ADMIN, but the two diverge as soon as either is changed.
 *
 * All mutating operations take the CallContext of the runtime call they
 * run in; the caller is `ctx.caller`.
 */

import type { Address, Role } from "@concord/types";
import { NULL_ADDRESS, ROLES, isAccount } from "@concord/types";
import { ACCESS_STREAM } from "@concord/event-store";
import { JournaledMap, JournaledValue, LedgerError } from "@concord/runtime";
import type { CallContext, LedgerErrorCode, Runtime } from "@concord/runtime";

type GrantKey = `${Role}:${Address}`;

function grantKey(account: Address, role: Role): GrantKey {
  return `${role}:${account}`;
}

export class AccessControlLedger {
  private readonly _owner: JournaledValue<Address>;
  private readonly _grants: JournaledMap<GrantKey, true>;

  /**
   * Initialize with `initialOwner` as owner and ADMIN.
   *
   * Initialization runs as its own call on behalf of the initial owner,
   * so the event log opens with the ownership transfer from the null
   * identity and the first ADMIN grant.
   *
   * @throws LedgerError INVALID_ACCOUNT if `initialOwner` is the null identity
   */
  constructor(runtime: Runtime, initialOwner: Address) {
    if (!isAccount(initialOwner)) {
      throw new LedgerError("INVALID_ACCOUNT", `Invalid initial owner '${initialOwner}'`);
    }
    this._owner = new JournaledValue(runtime.journal, initialOwner);
    this._grants = new JournaledMap(runtime.journal);

    runtime.execute(initialOwner, (ctx) => {
      ctx.emit(ACCESS_STREAM, "access.ownership.transferred", {
        previousOwner: NULL_ADDRESS,
        newOwner: initialOwner,
      });
      this._grant(ctx, initialOwner, "ADMIN");
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get owner(): Address {
    return this._owner.get();
  }

  hasRole(account: Address, role: Role): boolean {
    return this._grants.has(grantKey(account, role));
  }

  /** Roles held by `account`, in declaration order. */
  rolesOf(account: Address): readonly Role[] {
    return ROLES.filter((role) => this.hasRole(account, role));
  }

  /**
   * Throw `code` unless the caller holds `role`.
   * Shared by engines that gate operations on a role.
   */
  requireRole(ctx: CallContext, role: Role, code: LedgerErrorCode): void {
    if (!this.hasRole(ctx.caller, role)) {
      throw new LedgerError(code, `Caller '${ctx.caller}' does not hold ${role}`);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Roles
  // ───────────────────────────────────────────────────────────────────────

  /**
   * @throws LedgerError NOT_ADMIN, INVALID_ACCOUNT or ALREADY_GRANTED
   */
  grantRole(ctx: CallContext, account: Address, role: Role): void {
    this.requireRole(ctx, "ADMIN", "NOT_ADMIN");
    if (!isAccount(account)) {
      throw new LedgerError("INVALID_ACCOUNT", `Cannot grant ${role} to '${account}'`);
    }
    if (this.hasRole(account, role)) {
      throw new LedgerError("ALREADY_GRANTED", `'${account}' already holds ${role}`);
    }
    this._grant(ctx, account, role);
  }

  /**
   * @throws LedgerError NOT_ADMIN or NOT_GRANTED
   */
  revokeRole(ctx: CallContext, account: Address, role: Role): void {
    this.requireRole(ctx, "ADMIN", "NOT_ADMIN");
    const key = grantKey(account, role);
    if (!this._grants.has(key)) {
      throw new LedgerError("NOT_GRANTED", `'${account}' does not hold ${role}`);
    }
    this._grants.delete(key);
    ctx.emit(ACCESS_STREAM, "access.role.revoked", {
      account,
      role,
      revokedBy: ctx.caller,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Ownership
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Hand ownership to `newOwner`. Role grants are left as they are.
   *
   * @throws LedgerError NOT_OWNER or INVALID_ACCOUNT
   */
  transferOwnership(ctx: CallContext, newOwner: Address): void {
    const previousOwner = this._owner.get();
    if (ctx.caller !== previousOwner) {
      throw new LedgerError("NOT_OWNER", `Caller '${ctx.caller}' is not the owner`);
    }
    if (!isAccount(newOwner)) {
      throw new LedgerError("INVALID_ACCOUNT", `Cannot transfer ownership to '${newOwner}'`);
    }
    this._owner.set(newOwner);
    ctx.emit(ACCESS_STREAM, "access.ownership.transferred", { previousOwner, newOwner });
  }

  private _grant(ctx: CallContext, account: Address, role: Role): void {
    this._grants.set(grantKey(account, role), true);
    ctx.emit(ACCESS_STREAM, "access.role.granted", {
      account,
      role,
      grantedBy: ctx.caller,
    });
  }
}
