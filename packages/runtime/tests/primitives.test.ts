/**
 * Tests for the engine building blocks: Journal, Sequence, AccountIndex,
 * ReentrancyGuard and the clocks.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { Journal, JournaledMap, JournaledValue } from "../src/journal.js";
import { Sequence } from "../src/sequence.js";
import { AccountIndex } from "../src/account-index.js";
import { ReentrancyGuard } from "../src/reentrancy-guard.js";
import { ManualClock, SystemClock } from "../src/clock.js";
import { LedgerError } from "../src/errors.js";

// =============================================================================
// Journal
// =============================================================================

describe("Journal", () => {
  it("ignores records outside a frame", () => {
    const journal = new Journal();
    const value = new JournaledValue(journal, 1);

    value.set(2);
    const mark = journal.begin();
    journal.rollback(mark);

    expect(value.get()).toBe(2);
  });

  it("unwinds newest-first to the mark", () => {
    const journal = new Journal();
    const map = new JournaledMap<string, number>(journal);
    map.set("a", 1);

    const mark = journal.begin();
    map.set("a", 2);
    map.set("a", 3);
    map.set("b", 1);
    journal.rollback(mark);

    expect(map.get("a")).toBe(1);
    expect(map.has("b")).toBe(false);
    expect(map.size).toBe(1);
  });

  it("stays active until the outermost frame closes", () => {
    const journal = new Journal();
    journal.begin();
    journal.begin();
    journal.commit();
    expect(journal.active).toBe(true);
    journal.commit();
    expect(journal.active).toBe(false);
  });

  it("refuses to close a frame that was never opened", () => {
    expect(() => new Journal().commit()).toThrow(/without being opened/);
  });
});

// =============================================================================
// Sequence
// =============================================================================

describe("Sequence", () => {
  it("hands out strictly increasing ids from its start", () => {
    fc.assert(
      fc.property(fc.nat(100), fc.integer({ min: 1, max: 50 }), (start, count) => {
        const seq = new Sequence(new Journal(), start);
        const ids = Array.from({ length: count }, () => seq.next());

        expect(ids[0]).toBe(start);
        for (let i = 1; i < ids.length; i++) {
          expect(ids[i]).toBe(start + i);
        }
        expect(seq.allocated).toBe(count);
      }),
      { numRuns: 30 },
    );
  });

  it("releases ids taken by a rolled-back frame", () => {
    const journal = new Journal();
    const seq = new Sequence(journal, 1);
    seq.next();

    const mark = journal.begin();
    seq.next();
    journal.rollback(mark);

    expect(seq.peek()).toBe(2);
  });

  it("knows which ids it has handed out", () => {
    const seq = new Sequence(new Journal(), 1);
    seq.next();
    seq.next();

    expect(seq.contains(0)).toBe(false);
    expect(seq.contains(1)).toBe(true);
    expect(seq.contains(2)).toBe(true);
    expect(seq.contains(3)).toBe(false);
    expect(seq.contains(1.5)).toBe(false);
  });
});

// =============================================================================
// AccountIndex
// =============================================================================

describe("AccountIndex", () => {
  it("lists ids per account in insertion order", () => {
    const index = new AccountIndex(new Journal());
    index.append("alice", 3);
    index.append("bob", 1);
    index.append("alice", 7);

    expect(index.list("alice")).toEqual([3, 7]);
    expect(index.list("bob")).toEqual([1]);
    expect(index.list("carol")).toEqual([]);
  });

  it("returns a copy", () => {
    const index = new AccountIndex(new Journal());
    index.append("alice", 1);
    const list = index.list("alice") as number[];
    list.push(99);

    expect(index.list("alice")).toEqual([1]);
  });

  it("drops appends of a rolled-back frame", () => {
    const journal = new Journal();
    const index = new AccountIndex(journal);
    index.append("alice", 1);

    const mark = journal.begin();
    index.append("alice", 2);
    index.append("bob", 2);
    journal.rollback(mark);

    expect(index.list("alice")).toEqual([1]);
    expect(index.list("bob")).toEqual([]);
  });
});

// =============================================================================
// ReentrancyGuard
// =============================================================================

describe("ReentrancyGuard", () => {
  it("returns the guarded result", () => {
    expect(new ReentrancyGuard("op").enter(() => 42)).toBe(42);
  });

  it("rejects nested entry with REENTRANT_CALL", () => {
    const guard = new ReentrancyGuard("createDocument");

    try {
      guard.enter(() => guard.enter(() => 1));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(LedgerError);
      expect((err as LedgerError).code).toBe("REENTRANT_CALL");
      expect((err as LedgerError).message).toBe("Re-entrant call to createDocument");
    }
  });

  it("releases after the guarded region throws", () => {
    const guard = new ReentrancyGuard("op");
    expect(() =>
      guard.enter(() => {
        throw new Error("fail");
      }),
    ).toThrow("fail");

    expect(guard.entered).toBe(false);
    expect(guard.enter(() => "again")).toBe("again");
  });
});

// =============================================================================
// Clocks
// =============================================================================

describe("clocks", () => {
  it("ManualClock advances only forwards", () => {
    const clock = new ManualClock(100);
    clock.advance(5);
    expect(clock.now()).toBe(105);
    expect(() => clock.advance(-1)).toThrow(/backwards/);
  });

  it("SystemClock never decreases", () => {
    const clock = new SystemClock();
    const first = clock.now();
    const second = clock.now();
    expect(second).toBeGreaterThanOrEqual(first);
    expect(Number.isInteger(first)).toBe(true);
  });
});
