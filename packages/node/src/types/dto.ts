/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query/param validation.
 *
 * Native amounts are bigint in the ledger and decimal strings on the
 * wire; the schemas convert on the way in, the `to*Dto` helpers on the
 * way out.
 */

import { z } from "zod";
import { isAmountString, isRole } from "@concord/types";
import type { Address, Role } from "@concord/types";
import type { TreasuryState } from "../services/concord-service.js";

// =============================================================================
// Shared Schemas
// =============================================================================

/**
 * Any non-empty identity. The null identity passes here so the ledger
 * can reject it with its own error code.
 */
export const AddressSchema = z.string().min(1).max(256);

export const RoleSchema = z.custom<Role>(isRole, "Must be ADMIN or CURATOR");

export const AmountSchema = z
  .string()
  .refine(isAmountString, "Must be a non-negative integer written in decimal")
  .transform((value) => BigInt(value));

export const IdParamSchema = z
  .string()
  .regex(/^(0|[1-9][0-9]*)$/, "Must be a non-negative integer id")
  .transform(Number);

// =============================================================================
// Access DTOs
// =============================================================================

export const RoleChangeSchema = z.object({
  account: AddressSchema,
  role: RoleSchema,
});

export type RoleChangeDto = z.infer<typeof RoleChangeSchema>;

export const TransferOwnershipSchema = z.object({
  newOwner: AddressSchema,
});

export type TransferOwnershipDto = z.infer<typeof TransferOwnershipSchema>;

// =============================================================================
// Registry DTOs
// =============================================================================

export const RegisterItemSchema = z.object({
  uri: z.string().max(2048),
  category: z.string().max(256).default(""),
});

export type RegisterItemDto = z.infer<typeof RegisterItemSchema>;

export const ModerateItemSchema = z.object({
  verified: z.boolean(),
  active: z.boolean(),
});

export type ModerateItemDto = z.infer<typeof ModerateItemSchema>;

// =============================================================================
// Attestation DTOs
// =============================================================================

export const CreateDocumentSchema = z.object({
  documentHash: z.string().max(512),
  requiredSigners: z.array(AddressSchema).max(256),
  /** Native value attached to the call */
  value: AmountSchema.default("0"),
});

export type CreateDocumentDto = z.infer<typeof CreateDocumentSchema>;

// =============================================================================
// Treasury DTOs
// =============================================================================

export const SetStorageFeeSchema = z.object({
  fee: AmountSchema,
});

export type SetStorageFeeDto = z.infer<typeof SetStorageFeeSchema>;

export interface TreasuryDto {
  readonly account: Address;
  readonly storageFee: string;
  readonly balance: string;
}

export function toTreasuryDto(state: TreasuryState): TreasuryDto {
  return {
    account: state.account,
    storageFee: state.storageFee.toString(),
    balance: state.balance.toString(),
  };
}

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  afterPosition: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
