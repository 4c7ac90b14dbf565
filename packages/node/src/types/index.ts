/**
 * Type barrel: re-exports all public types from @popchain/node.
 */

// DTOs
export {
  AddressSchema,
  PriceSchema,
  PaginationQuerySchema,
  TierSchema,
  MintCertificateSchema,
  TransferCertificateSchema,
  RegisterAccountSchema,
  LinkWalletSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
  toTierDto,
  toCertificateResponse,
} from "./dto.js";
export type {
  TierDto,
  MintCertificateDto,
  TransferCertificateDto,
  RegisterAccountDto,
  LinkWalletDto,
  ListEventsQuery,
  ListStreamEventsQuery,
  CertificateResponse,
} from "./dto.js";

// Error
export { createErrorEnvelope, ApiError } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
