/**
 * Tests for AccessControlLedger — role grants and ownership.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { NULL_ADDRESS, TREASURY_ACCOUNT } from "@concord/types";
import { LedgerError, ManualClock, Runtime } from "@concord/runtime";
import type { LedgerErrorCode } from "@concord/runtime";
import { AccessControlLedger } from "../src/access-control.js";

const OWNER = "0xowner";
const ALICE = "0xalice";
const BOB = "0xbob";

function expectLedgerError(fn: () => unknown, code: LedgerErrorCode): void {
  try {
    fn();
    expect.unreachable();
  } catch (err) {
    expect(err).toBeInstanceOf(LedgerError);
    expect((err as LedgerError).code).toBe(code);
  }
}

describe("AccessControlLedger", () => {
  let runtime: Runtime;
  let access: AccessControlLedger;

  beforeEach(() => {
    runtime = new Runtime({ clock: new ManualClock() });
    access = new AccessControlLedger(runtime, OWNER);
  });

  // ─── Initialization ─────────────────────────────────────────────────

  describe("initialization", () => {
    it("makes the initial owner owner and ADMIN", () => {
      expect(access.owner).toBe(OWNER);
      expect(access.hasRole(OWNER, "ADMIN")).toBe(true);
      expect(access.hasRole(OWNER, "CURATOR")).toBe(false);
    });

    it("opens the event log with ownership and the first grant", () => {
      const events = runtime.eventStore.read("access").map((e) => e.event);

      expect(events.map((e) => e.type)).toEqual([
        "access.ownership.transferred",
        "access.role.granted",
      ]);
      expect(events[0]?.payload).toEqual({ previousOwner: NULL_ADDRESS, newOwner: OWNER });
      expect(events[1]?.payload).toEqual({ account: OWNER, role: "ADMIN", grantedBy: OWNER });
    });

    it("rejects the null identity as initial owner", () => {
      expectLedgerError(() => new AccessControlLedger(runtime, NULL_ADDRESS), "INVALID_ACCOUNT");
    });
  });

  // ─── grantRole ──────────────────────────────────────────────────────

  describe("grantRole", () => {
    it("grants a role and emits RoleGranted", () => {
      runtime.execute(OWNER, (ctx) => access.grantRole(ctx, ALICE, "CURATOR"));

      expect(access.hasRole(ALICE, "CURATOR")).toBe(true);
      const last = runtime.eventStore.readAll().at(-1);
      expect(last?.event.type).toBe("access.role.granted");
      expect(last?.event.payload).toEqual({ account: ALICE, role: "CURATOR", grantedBy: OWNER });
    });

    it("requires ADMIN", () => {
      expectLedgerError(
        () => runtime.execute(ALICE, (ctx) => access.grantRole(ctx, BOB, "CURATOR")),
        "NOT_ADMIN",
      );
    });

    it("checks authority before the account", () => {
      expectLedgerError(
        () => runtime.execute(ALICE, (ctx) => access.grantRole(ctx, NULL_ADDRESS, "CURATOR")),
        "NOT_ADMIN",
      );
    });

    it("rejects the null identity", () => {
      expectLedgerError(
        () => runtime.execute(OWNER, (ctx) => access.grantRole(ctx, NULL_ADDRESS, "CURATOR")),
        "INVALID_ACCOUNT",
      );
    });

    it("rejects a role already held", () => {
      expectLedgerError(
        () => runtime.execute(OWNER, (ctx) => access.grantRole(ctx, OWNER, "ADMIN")),
        "ALREADY_GRANTED",
      );
    });

    it("lets a granted ADMIN administer roles", () => {
      runtime.execute(OWNER, (ctx) => access.grantRole(ctx, ALICE, "ADMIN"));
      runtime.execute(ALICE, (ctx) => access.grantRole(ctx, BOB, "CURATOR"));

      expect(access.hasRole(BOB, "CURATOR")).toBe(true);
    });
  });

  // ─── revokeRole ─────────────────────────────────────────────────────

  describe("revokeRole", () => {
    beforeEach(() => {
      runtime.execute(OWNER, (ctx) => access.grantRole(ctx, ALICE, "CURATOR"));
    });

    it("revokes a held role and emits RoleRevoked", () => {
      runtime.execute(OWNER, (ctx) => access.revokeRole(ctx, ALICE, "CURATOR"));

      expect(access.hasRole(ALICE, "CURATOR")).toBe(false);
      const last = runtime.eventStore.readAll().at(-1);
      expect(last?.event.type).toBe("access.role.revoked");
      expect(last?.event.payload).toEqual({ account: ALICE, role: "CURATOR", revokedBy: OWNER });
    });

    it("requires ADMIN", () => {
      expectLedgerError(
        () => runtime.execute(BOB, (ctx) => access.revokeRole(ctx, ALICE, "CURATOR")),
        "NOT_ADMIN",
      );
    });

    it("rejects a role not held", () => {
      expectLedgerError(
        () => runtime.execute(OWNER, (ctx) => access.revokeRole(ctx, BOB, "CURATOR")),
        "NOT_GRANTED",
      );
    });

    it("allows granting again after revocation", () => {
      runtime.execute(OWNER, (ctx) => access.revokeRole(ctx, ALICE, "CURATOR"));
      runtime.execute(OWNER, (ctx) => access.grantRole(ctx, ALICE, "CURATOR"));

      expect(access.hasRole(ALICE, "CURATOR")).toBe(true);
    });

    it("is undone with a failed call", () => {
      expect(() =>
        runtime.execute(OWNER, (ctx) => {
          access.revokeRole(ctx, ALICE, "CURATOR");
          throw new Error("abort");
        }),
      ).toThrow("abort");

      expect(access.hasRole(ALICE, "CURATOR")).toBe(true);
    });
  });

  // ─── transferOwnership ──────────────────────────────────────────────

  describe("transferOwnership", () => {
    it("transfers ownership and emits OwnershipTransferred", () => {
      runtime.execute(OWNER, (ctx) => access.transferOwnership(ctx, ALICE));

      expect(access.owner).toBe(ALICE);
      const last = runtime.eventStore.readAll().at(-1);
      expect(last?.event.type).toBe("access.ownership.transferred");
      expect(last?.event.payload).toEqual({ previousOwner: OWNER, newOwner: ALICE });
    });

    it("is callable only by the owner", () => {
      expectLedgerError(
        () => runtime.execute(ALICE, (ctx) => access.transferOwnership(ctx, ALICE)),
        "NOT_OWNER",
      );
    });

    it("rejects the null identity", () => {
      expectLedgerError(
        () => runtime.execute(OWNER, (ctx) => access.transferOwnership(ctx, NULL_ADDRESS)),
        "INVALID_ACCOUNT",
      );
      expect(access.owner).toBe(OWNER);
    });

    it("rejects the reserved treasury account", () => {
      expectLedgerError(
        () => runtime.execute(OWNER, (ctx) => access.transferOwnership(ctx, TREASURY_ACCOUNT)),
        "INVALID_ACCOUNT",
      );
      expect(access.owner).toBe(OWNER);
    });
  });

  // ─── Independence of the two axes ───────────────────────────────────

  describe("owner and ADMIN independence", () => {
    it("ownership transfer leaves role grants untouched", () => {
      runtime.execute(OWNER, (ctx) => access.transferOwnership(ctx, ALICE));

      expect(access.hasRole(OWNER, "ADMIN")).toBe(true);
      expect(access.hasRole(ALICE, "ADMIN")).toBe(false);
      expectLedgerError(
        () => runtime.execute(ALICE, (ctx) => access.grantRole(ctx, BOB, "CURATOR")),
        "NOT_ADMIN",
      );
    });

    it("revoking the owner's ADMIN leaves ownership untouched", () => {
      runtime.execute(OWNER, (ctx) => access.grantRole(ctx, ALICE, "ADMIN"));
      runtime.execute(ALICE, (ctx) => access.revokeRole(ctx, OWNER, "ADMIN"));

      expect(access.owner).toBe(OWNER);
      expect(access.hasRole(OWNER, "ADMIN")).toBe(false);
      runtime.execute(OWNER, (ctx) => access.transferOwnership(ctx, BOB));
      expect(access.owner).toBe(BOB);
    });

    it("an ADMIN may revoke its own ADMIN", () => {
      runtime.execute(OWNER, (ctx) => access.revokeRole(ctx, OWNER, "ADMIN"));

      expect(access.rolesOf(OWNER)).toEqual([]);
      expect(access.owner).toBe(OWNER);
    });
  });

  // ─── requireRole / rolesOf ──────────────────────────────────────────

  describe("helpers", () => {
    it("lists roles in declaration order", () => {
      runtime.execute(OWNER, (ctx) => access.grantRole(ctx, OWNER, "CURATOR"));
      expect(access.rolesOf(OWNER)).toEqual(["ADMIN", "CURATOR"]);
      expect(access.rolesOf(BOB)).toEqual([]);
    });

    it("requireRole throws the supplied code", () => {
      expectLedgerError(
        () => runtime.execute(BOB, (ctx) => access.requireRole(ctx, "CURATOR", "NOT_CURATOR")),
        "NOT_CURATOR",
      );
    });
  });
});
