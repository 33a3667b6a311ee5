/**
 * Identity Types
 *
 * Callers are identified by an opaque address string supplied by the
 * execution environment. The null identity and reserved ledger
 * accounts are never valid callers, grantees or owners.
 */

/** Opaque account identity (e.g. "0xabc…", "alice"). */
export type Address = string;

/** The null identity. Rejected wherever an account is named. */
export const NULL_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/** Bank account holding collected storage fees. Reserved. */
export const TREASURY_ACCOUNT: Address = "concord:treasury";

/**
 * Capabilities grantable per identity.
 *
 * - ADMIN: may grant and revoke roles
 * - CURATOR: may moderate registry items
 */
export type Role = "ADMIN" | "CURATOR";

export const ROLES: readonly Role[] = ["ADMIN", "CURATOR"];
