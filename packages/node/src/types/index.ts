/**
 * Type barrel — re-exports all public types from @capvault/node.
 */

// DTOs
export {
  BaseUnitsSchema,
  AddressSchema,
  AssetIdSchema,
  PaginationQuerySchema,
  DepositSchema,
  NativeDepositSchema,
  QuoteQuerySchema,
  WithdrawSchema,
  SetCapSchema,
  RescueSchema,
  ListEventsQuerySchema,
  depositReceiptDto,
  depositQuoteDto,
  withdrawalReceiptDto,
  rescueReceiptDto,
  vaultStatusDto,
} from "./dto.js";
export type {
  DepositDto,
  NativeDepositDto,
  QuoteQuery,
  WithdrawDto,
  SetCapDto,
  RescueDto,
  ListEventsQuery,
  VaultStatus,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
