/**
 * Unit Price Calculator
 */

import { Money, UNIT_PRICE_SCALE, parseMoney } from './money';
import { inferPackCount } from './pack-count';
import type { ListingLike } from '../types';

/**
 * price / packCount quantized to 4 fractional digits (round-half-up).
 * Undefined when the price is missing or the pack count is not a positive integer.
 */
export function computeUnitPrice(price: unknown, packCount: number): Money | undefined {
  const parsed = price instanceof Money ? price : parseMoney(price);
  if (parsed === undefined) return undefined;
  if (!Number.isSafeInteger(packCount) || packCount < 1) return undefined;
  return parsed.divInt(packCount, UNIT_PRICE_SCALE);
}

/** Unit price of a listing from its own listed price and inferred pack count. */
export function listingUnitPrice(listing: ListingLike): Money | undefined {
  return computeUnitPrice(listing.price, inferPackCount(listing));
}

/**
 * Unit price an offer is compared at.
 *
 * A declared unit price > 0 is trusted unless declared x packCount is below
 * half the listed price, which means it was declared for a different pack
 * size; then, and when nothing usable is declared, the computed unit price.
 * Either way the result is quantized to 4 fractional digits.
 */
export function resolveOfferUnitPrice(offer: ListingLike): Money | undefined {
  const packCount = inferPackCount(offer);
  const listed = parseMoney(offer.price);
  const declared = parseMoney(offer.unit_price);

  if (declared !== undefined && declared.isPositive()) {
    if (listed !== undefined && declared.mulInt(packCount * 2).lt(listed)) {
      return computeUnitPrice(listed, packCount);
    }
    return declared.rescale(UNIT_PRICE_SCALE);
  }
  return computeUnitPrice(listed, packCount);
}
