/**
 * Type barrel — re-exports all public types from @concord/node.
 */

// DTOs
export {
  AddressSchema,
  RoleSchema,
  AmountSchema,
  IdParamSchema,
  RoleChangeSchema,
  TransferOwnershipSchema,
  RegisterItemSchema,
  ModerateItemSchema,
  CreateDocumentSchema,
  SetStorageFeeSchema,
  ListEventsQuerySchema,
  toTreasuryDto,
} from "./dto.js";
export type {
  RoleChangeDto,
  TransferOwnershipDto,
  RegisterItemDto,
  ModerateItemDto,
  CreateDocumentDto,
  SetStorageFeeDto,
  TreasuryDto,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
