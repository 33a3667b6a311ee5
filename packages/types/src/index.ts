/**
 * @concord/types — Shared domain types for the Concord stack.
 *
 * These types are used across all Concord packages:
 * - Identity and roles
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Identity types
export type { Address, Role } from "./identity.js";
export { NULL_ADDRESS, ROLES, TREASURY_ACCOUNT } from "./identity.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAccount,
  isRole,
  isAmountString,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
