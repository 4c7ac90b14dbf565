/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Response mappers render bigint fields as decimal strings, since
 * JSON has no 64-bit integer type.
 */

import { z } from "zod";
import type { Tier } from "@popchain/types";
import type { CertificateView } from "../services/popchain-service.js";

// =============================================================================
// Shared Schemas
// =============================================================================

const ADDRESS = /^0x[0-9a-fA-F]{1,64}$/;

export const AddressSchema = z.string().regex(ADDRESS, "Expected 0x followed by 1-64 hex digits");

/** Unsigned integer as a decimal string; range is checked by the tier catalog. */
export const PriceSchema = z.string().regex(/^\d+$/, "Expected a decimal integer string");

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Certificate DTOs
// =============================================================================

export const TierSchema = z.object({
  name: z.string().min(1).max(128),
  description: z.string().max(1024),
  url: z.string().max(2048),
  price: PriceSchema,
});

export type TierDto = z.infer<typeof TierSchema>;

export const MintCertificateSchema = z
  .object({
    eventId: z.string().min(1).max(128),
    url: z.string().max(2048),
    accountId: z.string().min(1).max(128),
    /** Index into the default tiers */
    tierIndex: z.number().int().min(0).optional(),
    /** A custom tier */
    tier: TierSchema.optional(),
  })
  .refine((v) => (v.tierIndex === undefined) !== (v.tier === undefined), {
    message: "Exactly one of tierIndex or tier is required",
    path: ["tierIndex"],
  });

export type MintCertificateDto = z.infer<typeof MintCertificateSchema>;

export const TransferCertificateSchema = z.object({
  accountId: z.string().min(1).max(128),
  /** Current holder signing the transfer; defaults to the service wallet */
  sender: AddressSchema.optional(),
});

export type TransferCertificateDto = z.infer<typeof TransferCertificateSchema>;

// =============================================================================
// Account DTOs
// =============================================================================

export const RegisterAccountSchema = z.object({
  id: z.string().min(1).max(128),
  owner: AddressSchema.nullable().default(null),
});

export type RegisterAccountDto = z.infer<typeof RegisterAccountSchema>;

export const LinkWalletSchema = z.object({
  owner: AddressSchema,
});

export type LinkWalletDto = z.infer<typeof LinkWalletSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;

// =============================================================================
// Response Mappers
// =============================================================================

export interface CertificateResponse {
  readonly id: string;
  readonly eventId: string;
  readonly tierName: string;
  readonly url: string;
  readonly tierUrl: string;
  readonly issuedTo: string | null;
  readonly issuedAt: number;
  readonly mintPrice: string;
  readonly custodian: string;
}

export function toTierDto(tier: Tier): TierDto {
  return {
    name: tier.name,
    description: tier.description,
    url: tier.url,
    price: tier.price.toString(),
  };
}

export function toCertificateResponse(view: CertificateView): CertificateResponse {
  return {
    id: view.id,
    eventId: view.eventId,
    tierName: view.tierName,
    url: view.url,
    tierUrl: view.tierUrl,
    issuedTo: view.issuedTo,
    issuedAt: view.issuedAt,
    mintPrice: view.mintPrice.toString(),
    custodian: view.custodian,
  };
}
