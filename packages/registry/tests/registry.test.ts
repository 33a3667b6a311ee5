/**
 * Tests for RegistryEngine — registration, moderation, self-deactivation.
 */

import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import { LedgerError, ManualClock, Runtime } from "@concord/runtime";
import type { LedgerErrorCode } from "@concord/runtime";
import { AccessControlLedger } from "@concord/access-control";
import { RegistryEngine } from "../src/registry.js";

const OWNER = "0xowner";
const CURATOR = "0xcurator";
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

describe("RegistryEngine", () => {
  let clock: ManualClock;
  let runtime: Runtime;
  let registry: RegistryEngine;

  beforeEach(() => {
    clock = new ManualClock(1_700_000_000);
    runtime = new Runtime({ clock });
    const access = new AccessControlLedger(runtime, OWNER);
    runtime.execute(OWNER, (ctx) => access.grantRole(ctx, CURATOR, "CURATOR"));
    registry = new RegistryEngine(runtime, access);
  });

  function register(caller: string, uri = "ipfs://item", category = "art"): number {
    return runtime.execute(caller, (ctx) => registry.registerItem(ctx, uri, category));
  }

  // ─── registerItem ───────────────────────────────────────────────────

  describe("registerItem", () => {
    it("allocates ids from 0", () => {
      expect(register(ALICE)).toBe(0);
      expect(register(BOB)).toBe(1);
      expect(registry.itemCount).toBe(2);
    });

    it("stores an unverified, active item", () => {
      const id = register(ALICE, "ipfs://a", "music");

      expect(registry.getItem(id)).toEqual({
        id: 0,
        submitter: ALICE,
        uri: "ipfs://a",
        category: "music",
        createdAt: 1_700_000_000,
        isVerified: false,
        isActive: true,
      });
    });

    it("accepts an empty category", () => {
      const id = register(ALICE, "ipfs://a", "");
      expect(registry.getItem(id).category).toBe("");
    });

    it("emits ItemRegistered on the item stream", () => {
      register(ALICE, "ipfs://a", "music");

      const [stored] = runtime.eventStore.read("item-0");
      expect(stored?.event.type).toBe("registry.item.registered");
      expect(stored?.event.payload).toEqual({
        itemId: 0,
        submitter: ALICE,
        uri: "ipfs://a",
        category: "music",
        timestamp: 1_700_000_000,
      });
    });

    it("rejects an empty URI without consuming an id", () => {
      expectLedgerError(() => register(ALICE, ""), "EMPTY_URI");

      expect(registry.itemCount).toBe(0);
      expect(registry.getItemsOf(ALICE)).toEqual([]);
      expect(register(ALICE)).toBe(0);
    });

    it("indexes items by submitter", () => {
      register(ALICE);
      register(BOB);
      register(ALICE);

      expect(registry.getItemsOf(ALICE)).toEqual([0, 2]);
      expect(registry.getItemsOf(BOB)).toEqual([1]);
    });

    it("hands out strictly increasing ids across any mix of calls", () => {
      fc.assert(
        fc.property(
          fc.array(fc.record({ caller: fc.constantFrom(ALICE, BOB), valid: fc.boolean() }), {
            maxLength: 30,
          }),
          (calls) => {
            const rt = new Runtime({ clock: new ManualClock() });
            const engine = new RegistryEngine(rt, new AccessControlLedger(rt, OWNER));
            const ids: number[] = [];

            for (const { caller, valid } of calls) {
              try {
                ids.push(
                  rt.execute(caller, (ctx) =>
                    engine.registerItem(ctx, valid ? "ipfs://x" : "", "c"),
                  ),
                );
              } catch (err) {
                expect((err as LedgerError).code).toBe("EMPTY_URI");
              }
            }

            expect(ids).toEqual(ids.map((_, i) => i));
            expect(engine.itemCount).toBe(ids.length);
          },
        ),
        { numRuns: 50 },
      );
    });
  });

  // ─── moderateItem ───────────────────────────────────────────────────

  describe("moderateItem", () => {
    beforeEach(() => {
      register(ALICE);
    });

    it("overwrites both flags and emits ItemStatusUpdated", () => {
      clock.advance(10);
      runtime.execute(CURATOR, (ctx) => registry.moderateItem(ctx, 0, true, false));

      const item = registry.getItem(0);
      expect(item.isVerified).toBe(true);
      expect(item.isActive).toBe(false);
      expect(item.createdAt).toBe(1_700_000_000);

      const updates = runtime.eventStore.read("item-0");
      expect(updates[1]?.event.type).toBe("registry.item.status_updated");
      expect(updates[1]?.event.payload).toEqual({
        itemId: 0,
        isVerified: true,
        isActive: false,
        timestamp: 1_700_000_010,
      });
    });

    it("requires CURATOR", () => {
      expectLedgerError(
        () => runtime.execute(OWNER, (ctx) => registry.moderateItem(ctx, 0, true, true)),
        "NOT_CURATOR",
      );
    });

    it("checks the role before the item", () => {
      expectLedgerError(
        () => runtime.execute(ALICE, (ctx) => registry.moderateItem(ctx, 99, true, true)),
        "NOT_CURATOR",
      );
    });

    it("rejects an unknown item", () => {
      expectLedgerError(
        () => runtime.execute(CURATOR, (ctx) => registry.moderateItem(ctx, 99, true, true)),
        "ITEM_NOT_FOUND",
      );
    });

    it("may re-activate an item its submitter deactivated", () => {
      runtime.execute(ALICE, (ctx) => registry.deactivateOwnItem(ctx, 0));
      runtime.execute(CURATOR, (ctx) => registry.moderateItem(ctx, 0, false, true));

      expect(registry.getItem(0).isActive).toBe(true);
    });

    it("emits even when the flags do not change", () => {
      runtime.execute(CURATOR, (ctx) => registry.moderateItem(ctx, 0, false, true));
      expect(runtime.eventStore.streamVersion("item-0")).toBe(2);
    });
  });

  // ─── deactivateOwnItem ──────────────────────────────────────────────

  describe("deactivateOwnItem", () => {
    beforeEach(() => {
      register(ALICE);
      runtime.execute(CURATOR, (ctx) => registry.moderateItem(ctx, 0, true, true));
    });

    it("deactivates and keeps the verification flag", () => {
      runtime.execute(ALICE, (ctx) => registry.deactivateOwnItem(ctx, 0));

      const item = registry.getItem(0);
      expect(item.isActive).toBe(false);
      expect(item.isVerified).toBe(true);

      const last = runtime.eventStore.read("item-0").at(-1);
      expect(last?.event.payload).toEqual({
        itemId: 0,
        isVerified: true,
        isActive: false,
        timestamp: 1_700_000_000,
      });
    });

    it("rejects an unknown item", () => {
      expectLedgerError(
        () => runtime.execute(ALICE, (ctx) => registry.deactivateOwnItem(ctx, 5)),
        "ITEM_NOT_FOUND",
      );
    });

    it("is reserved to the submitter", () => {
      expectLedgerError(
        () => runtime.execute(CURATOR, (ctx) => registry.deactivateOwnItem(ctx, 0)),
        "NOT_SUBMITTER",
      );
    });

    it("rejects an item already inactive", () => {
      runtime.execute(ALICE, (ctx) => registry.deactivateOwnItem(ctx, 0));
      expectLedgerError(
        () => runtime.execute(ALICE, (ctx) => registry.deactivateOwnItem(ctx, 0)),
        "ALREADY_INACTIVE",
      );
    });
  });

  // ─── Queries ────────────────────────────────────────────────────────

  describe("queries", () => {
    it("getItem rejects an unknown id", () => {
      expectLedgerError(() => registry.getItem(0), "ITEM_NOT_FOUND");
    });

    it("getItemsOf is empty for an unknown account", () => {
      expect(registry.getItemsOf(BOB)).toEqual([]);
    });
  });
});
