/**
 * Tier Catalog: Certificate tier templates.
 *
 * A tier is a frozen value: name, description, artwork URL and the
 * price (unsigned 64-bit, minor units) recorded on every certificate
 * minted from it. Minting copies the tier's fields; the tier itself
 * is never stored or mutated.
 *
 * Rules:
 * - Prices are bigint in [0, 2^64)
 * - Custom tier lists are validated for equal lengths before zipping
 * - Byte inputs decode strictly: UTF-8 for text, ASCII for URLs
 */

import { isU64 } from "@popchain/types";
import type { Tier } from "@popchain/types";
import { CertificateError } from "./errors.js";

// =============================================================================
// Construction
// =============================================================================

/**
 * Build a tier. Throws CertificateError("INVALID_PRICE") when the
 * price is outside the unsigned 64-bit range.
 */
export function createTier(
  name: string,
  description: string,
  url: string,
  price: bigint,
): Tier {
  if (!isU64(price)) {
    throw new CertificateError(
      "INVALID_PRICE",
      `Tier price must be an unsigned 64-bit integer, got ${price}`,
    );
  }
  return Object.freeze({ name, description, url, price });
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function decodeUtf8(bytes: Uint8Array, field: string): string {
  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw new CertificateError(
      "ENCODING_FAILURE",
      `Tier ${field} is not valid UTF-8: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

function decodeAscii(bytes: Uint8Array, field: string): string {
  const offset = bytes.findIndex((b) => b > 0x7f);
  if (offset !== -1) {
    throw new CertificateError(
      "ENCODING_FAILURE",
      `Tier ${field} contains a non-ASCII byte at offset ${offset}`,
    );
  }
  return utf8.decode(bytes);
}

/**
 * Build a tier from raw byte fields, as they arrive from a wire format.
 * Throws CertificateError("ENCODING_FAILURE") on malformed input.
 */
export function createTierFromBytes(
  nameBytes: Uint8Array,
  descriptionBytes: Uint8Array,
  urlBytes: Uint8Array,
  price: bigint,
): Tier {
  return createTier(
    decodeUtf8(nameBytes, "name"),
    decodeUtf8(descriptionBytes, "description"),
    decodeAscii(urlBytes, "url"),
    price,
  );
}

// =============================================================================
// Catalogs
// =============================================================================

const DEFAULT_TIERS = [
  {
    name: "PopPass",
    description: "Entry-level proof of participation",
    url: "https://popchain.example/tiers/pop-pass.png",
    price: 10_000_000n,
  },
  {
    name: "PopBadge",
    description: "Badge for active participants",
    url: "https://popchain.example/tiers/pop-badge.png",
    price: 30_000_000n,
  },
  {
    name: "PopMedal",
    description: "Medal for distinguished contributors",
    url: "https://popchain.example/tiers/pop-medal.png",
    price: 50_000_000n,
  },
  {
    name: "PopTrophy",
    description: "Trophy for top achievers",
    url: "https://popchain.example/tiers/pop-trophy.png",
    price: 70_000_000n,
  },
] as const;

/**
 * The four standard tiers, cheapest first.
 */
export function defaultPopchainTiers(): readonly Tier[] {
  return DEFAULT_TIERS.map((t) => createTier(t.name, t.description, t.url, t.price));
}

/**
 * Zip parallel field lists into tiers.
 * Throws CertificateError("LENGTH_MISMATCH") unless all four lists
 * have the same length.
 */
export function createCustomTiers(
  names: readonly string[],
  descriptions: readonly string[],
  urls: readonly string[],
  prices: readonly bigint[],
): readonly Tier[] {
  const n = names.length;
  if (descriptions.length !== n || urls.length !== n || prices.length !== n) {
    throw new CertificateError(
      "LENGTH_MISMATCH",
      `Tier inputs differ in length: names=${n}, descriptions=${descriptions.length}, ` +
        `urls=${urls.length}, prices=${prices.length}`,
    );
  }

  return names.map((name, i) => createTier(name, descriptions[i], urls[i], prices[i]));
}

// =============================================================================
// Accessors
// =============================================================================

export function getTierPrice(tier: Tier): bigint {
  return tier.price;
}

export function getTierName(tier: Tier): string {
  return tier.name;
}
