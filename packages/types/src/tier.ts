/**
 * Tier Types
 *
 * A tier is a priced template describing a class of certificate.
 * Tiers have no identity: they are plain values, frozen at construction
 * and copied wholesale into a certificate when it is minted.
 */

/**
 * A priced certificate template.
 */
export interface Tier {
  /** Display name (e.g., "PopPass") */
  readonly name: string;

  /** Human-readable description of what this tier attests */
  readonly description: string;

  /** Artwork reference (URL-like resource locator) */
  readonly url: string;

  /**
   * Price in minor currency units.
   * Unsigned 64-bit; bigint to avoid floating-point loss.
   */
  readonly price: bigint;
}
