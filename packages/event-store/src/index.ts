/**
 * @concord/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - The ledger event catalogue (nine event types)
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  EventHandlerErrorReporter,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export type { HashableEvent } from "./hash-chain.js";
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Ledger events
export {
  LEDGER_EVENTS,
  ACCESS_STREAM,
  itemStream,
  documentStream,
  isLedgerEventType,
} from "./ledger-events.js";
export type {
  LedgerEventPayloads,
  LedgerEventType,
  RoleGrantedPayload,
  RoleRevokedPayload,
  OwnershipTransferredPayload,
  ItemRegisteredPayload,
  ItemStatusUpdatedPayload,
  DocumentCreatedPayload,
  DocumentSignedPayload,
  DocumentCompletedPayload,
  DocumentRevokedPayload,
} from "./ledger-events.js";
