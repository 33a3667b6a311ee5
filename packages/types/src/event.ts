/**
 * Event Types
 *
 * Append-only event architecture.
 * Every state transition in Concord is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which call)
 * - Events are replayable: same events → same state
 * - No UPDATE, no DELETE — only new events
 */

/** Subsystem that emitted an event. */
export type EventSource = "access" | "registry" | "attestation";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp of the call that produced the event */
  readonly timestamp: string;

  /** Caller whose operation produced this event */
  readonly actor: string;

  /** Shared by every event produced within one outermost call */
  readonly correlationId: string;

  /** Which Concord subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event in the Concord system.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "registry.item.registered") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by the catalogue) */
  readonly payload: Readonly<Record<string, unknown>>;
}
