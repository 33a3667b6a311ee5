/**
 * @concord/attestation — Multi-party document attestation and fee treasury.
 *
 * @packageDocumentation
 */

export { AttestationEngine } from "./attestation.js";
export { FeeTreasury, TREASURY_ACCOUNT } from "./treasury.js";
export type { FeeTreasuryOptions } from "./treasury.js";
export type { Document, OwnerSource } from "./types.js";
