/**
 * Runtime Type Guards
 *
 * Narrowing functions for Concord domain types.
 * These enable safe runtime validation at system boundaries
 * (HTTP inputs, deserialized events, configuration).
 */

import type { Address, Role } from "./identity.js";
import { NULL_ADDRESS, ROLES, TREASURY_ACCOUNT } from "./identity.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Identity guards
// =============================================================================

const ROLE_SET = new Set<string>(ROLES);
const RESERVED = new Set<string>([NULL_ADDRESS, TREASURY_ACCOUNT]);

/** True for any non-empty address that is not reserved. */
export function isAccount(value: unknown): value is Address {
  return typeof value === "string" && value.length > 0 && !RESERVED.has(value);
}

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLE_SET.has(value);
}

// =============================================================================
// Amount guards
// =============================================================================

const AMOUNT_PATTERN = /^(0|[1-9][0-9]*)$/;

/** A non-negative integer amount written as a decimal string. */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["access", "registry", "attestation"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
