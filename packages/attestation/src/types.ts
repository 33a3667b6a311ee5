/**
 * Attestation Types
 */

import type { Address } from "@concord/types";

/**
 * A document awaiting (or holding) attestations from a fixed signer set.
 *
 * Records are replaced on every transition, never mutated in place.
 * `isCompleted` and `isActive` are independent: completion does not
 * deactivate, and revocation is only possible before completion.
 */
export interface Document {
  readonly id: number;
  readonly documentHash: string;
  readonly creator: Address;
  /** Unix seconds */
  readonly createdAt: number;
  /** Unique identities, in the order first named at creation */
  readonly requiredSigners: readonly Address[];
  /** Identities that have signed, in signing order */
  readonly signatures: readonly Address[];
  readonly signatureCount: number;
  readonly isActive: boolean;
  readonly isCompleted: boolean;
}

/**
 * Anything that names the current owner.
 * The treasury reads ownership through this rather than holding its own.
 */
export interface OwnerSource {
  readonly owner: Address;
}
