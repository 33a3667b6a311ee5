/**
 * Tests for the ledger event catalogue.
 */

import { describe, it, expect } from "vitest";
import {
  LEDGER_EVENTS,
  documentStream,
  isLedgerEventType,
  itemStream,
} from "../src/ledger-events.js";

describe("LEDGER_EVENTS", () => {
  it("prefixes every event type with its source subsystem", () => {
    for (const [type, source] of Object.entries(LEDGER_EVENTS)) {
      expect(type.startsWith(`${source}.`)).toBe(true);
    }
  });

  it("defines nine event types", () => {
    expect(Object.keys(LEDGER_EVENTS)).toHaveLength(9);
  });
});

describe("isLedgerEventType", () => {
  it("recognises catalogued types", () => {
    expect(isLedgerEventType("attestation.document.completed")).toBe(true);
  });

  it("rejects unknown types and prototype keys", () => {
    expect(isLedgerEventType("attestation.document.deleted")).toBe(false);
    expect(isLedgerEventType("toString")).toBe(false);
  });
});

describe("stream names", () => {
  it("names item and document streams by id", () => {
    expect(itemStream(0)).toBe("item-0");
    expect(documentStream(12)).toBe("document-12");
  });
});
