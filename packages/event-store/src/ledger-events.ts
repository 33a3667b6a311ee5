/**
 * @concord/event-store — Ledger Event Catalogue.
 *
 * Every event the Concord engines emit, with its payload shape and
 * the subsystem that owns it.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 *
 * Streams:
 * - `access`          role grants, revocations and ownership transfers
 * - `item-<id>`       one registry item's history
 * - `document-<id>`   one document's history
 */

import type { Address, EventSource, Role } from "@concord/types";

// =============================================================================
// Access Events
// =============================================================================

export type RoleGrantedPayload = {
  readonly account: Address;
  readonly role: Role;
  readonly grantedBy: Address;
};

export type RoleRevokedPayload = {
  readonly account: Address;
  readonly role: Role;
  readonly revokedBy: Address;
};

export type OwnershipTransferredPayload = {
  readonly previousOwner: Address;
  readonly newOwner: Address;
};

// =============================================================================
// Registry Events
// =============================================================================

export type ItemRegisteredPayload = {
  readonly itemId: number;
  readonly submitter: Address;
  readonly uri: string;
  readonly category: string;
  /** Unix seconds */
  readonly timestamp: number;
};

export type ItemStatusUpdatedPayload = {
  readonly itemId: number;
  readonly isVerified: boolean;
  readonly isActive: boolean;
  /** Unix seconds */
  readonly timestamp: number;
};

// =============================================================================
// Attestation Events
// =============================================================================

export type DocumentCreatedPayload = {
  readonly documentId: number;
  readonly creator: Address;
  readonly documentHash: string;
};

export type DocumentSignedPayload = {
  readonly documentId: number;
  readonly signer: Address;
};

export type DocumentCompletedPayload = {
  readonly documentId: number;
};

export type DocumentRevokedPayload = {
  readonly documentId: number;
};

// =============================================================================
// Catalogue
// =============================================================================

/** Payload type per event type. */
export interface LedgerEventPayloads {
  "access.role.granted": RoleGrantedPayload;
  "access.role.revoked": RoleRevokedPayload;
  "access.ownership.transferred": OwnershipTransferredPayload;
  "registry.item.registered": ItemRegisteredPayload;
  "registry.item.status_updated": ItemStatusUpdatedPayload;
  "attestation.document.created": DocumentCreatedPayload;
  "attestation.document.signed": DocumentSignedPayload;
  "attestation.document.completed": DocumentCompletedPayload;
  "attestation.document.revoked": DocumentRevokedPayload;
}

export type LedgerEventType = keyof LedgerEventPayloads;

export const LEDGER_EVENTS: Readonly<Record<LedgerEventType, EventSource>> = {
  "access.role.granted": "access",
  "access.role.revoked": "access",
  "access.ownership.transferred": "access",
  "registry.item.registered": "registry",
  "registry.item.status_updated": "registry",
  "attestation.document.created": "attestation",
  "attestation.document.signed": "attestation",
  "attestation.document.completed": "attestation",
  "attestation.document.revoked": "attestation",
};

export const ACCESS_STREAM = "access";

export function itemStream(itemId: number): string {
  return `item-${itemId}`;
}

export function documentStream(documentId: number): string {
  return `document-${documentId}`;
}

export function isLedgerEventType(value: string): value is LedgerEventType {
  return Object.prototype.hasOwnProperty.call(LEDGER_EVENTS, value);
}
