/**
 * Tests for NativeBank — balances, transfers and transfer hooks.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { Runtime } from "../src/runtime.js";
import { LedgerError } from "../src/errors.js";
import type { NativeBank } from "../src/bank.js";

describe("NativeBank", () => {
  let runtime: Runtime;
  let bank: NativeBank;

  beforeEach(() => {
    runtime = new Runtime();
    bank = runtime.bank;
    bank.mint("alice", 100n);
  });

  describe("balances", () => {
    it("reports zero for unknown accounts", () => {
      expect(bank.balanceOf("nobody")).toBe(0n);
    });

    it("mints into an account", () => {
      bank.mint("alice", 50n);
      expect(bank.balanceOf("alice")).toBe(150n);
    });

    it("rejects a negative mint", () => {
      expect(() => bank.mint("alice", -1n)).toThrow(/Amount must be >= 0/);
    });
  });

  describe("transfer", () => {
    it("moves value between accounts", () => {
      bank.transfer("alice", "bob", 30n);

      expect(bank.balanceOf("alice")).toBe(70n);
      expect(bank.balanceOf("bob")).toBe(30n);
    });

    it("fails with INSUFFICIENT_BALANCE when the sender is short", () => {
      try {
        bank.transfer("alice", "bob", 101n);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(LedgerError);
        expect((err as LedgerError).code).toBe("INSUFFICIENT_BALANCE");
        expect((err as LedgerError).category).toBe("TRANSFER_FAILED");
      }
      expect(bank.balanceOf("alice")).toBe(100n);
    });

    it("allows a zero transfer", () => {
      bank.transfer("carol", "bob", 0n);
      expect(bank.balanceOf("bob")).toBe(0n);
    });
  });

  describe("hooks", () => {
    it("calls onSend before the debit and onReceive after the credit", () => {
      const observed: string[] = [];
      bank.setHook("alice", {
        onSend: () => observed.push(`send:${bank.balanceOf("alice")}`),
      });
      bank.setHook("bob", {
        onReceive: () => observed.push(`receive:${bank.balanceOf("bob")}`),
      });

      bank.transfer("alice", "bob", 10n);

      expect(observed).toEqual(["send:100", "receive:10"]);
    });

    it("passes the transfer to the hook", () => {
      const onReceive = vi.fn();
      bank.setHook("bob", { onReceive });

      bank.transfer("alice", "bob", 10n);

      expect(onReceive).toHaveBeenCalledWith({ from: "alice", to: "bob", amount: 10n });
    });

    it("undoes a transfer the recipient rejects", () => {
      bank.setHook("bob", {
        onReceive: () => {
          throw new Error("no thanks");
        },
      });

      try {
        bank.transfer("alice", "bob", 10n);
        expect.unreachable();
      } catch (err) {
        expect((err as LedgerError).code).toBe("TRANSFER_REJECTED");
        expect((err as LedgerError).cause).toEqual(new Error("no thanks"));
      }
      expect(bank.balanceOf("alice")).toBe(100n);
      expect(bank.balanceOf("bob")).toBe(0n);
    });

    it("undoes what a rejecting recipient did before throwing", () => {
      bank.setHook("bob", {
        onReceive: () => {
          bank.transfer("bob", "carol", 5n);
          throw new Error("changed my mind");
        },
      });

      expect(() => bank.transfer("alice", "bob", 10n)).toThrow(/rejected/);
      expect(bank.balanceOf("carol")).toBe(0n);
      expect(bank.balanceOf("alice")).toBe(100n);
    });

    it("propagates sender hook errors unchanged", () => {
      bank.setHook("alice", {
        onSend: () => {
          throw new LedgerError("REENTRANT_CALL", "nested");
        },
      });

      expect(() => bank.transfer("alice", "bob", 10n)).toThrow("nested");
      expect(bank.balanceOf("alice")).toBe(100n);
    });

    it("stops calling a cleared hook", () => {
      const onReceive = vi.fn();
      bank.setHook("bob", { onReceive });
      bank.setHook("bob", undefined);

      bank.transfer("alice", "bob", 1n);

      expect(onReceive).not.toHaveBeenCalled();
    });
  });
});
