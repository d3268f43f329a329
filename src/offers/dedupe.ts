/**
 * Offer Deduplicator
 *
 * The marketplace feed can echo a primary seller's offer, so a SKU's two
 * offer lists are concatenated (primary first) and collapsed by seller
 * identity. The first occurrence wins.
 */

import { readText } from '../utils/fields';
import type { SellerOffer } from '../types';

/** Identity key: lower-cased seller name + (seller id | seller sku | ''). */
export function sellerIdentityKey(offer: SellerOffer): string {
  const name = readText(offer.seller_name).toLowerCase();
  const id = readText(offer.seller_id) || readText(offer.seller_sku);
  return `${name}|${id}`;
}

export function dedupeOffers(
  primaryOffers: readonly SellerOffer[],
  marketOffers: readonly SellerOffer[],
): SellerOffer[] {
  const seen = new Set<string>();
  const result: SellerOffer[] = [];

  for (const offer of [...primaryOffers, ...marketOffers]) {
    const key = sellerIdentityKey(offer);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(offer);
  }

  return result;
}
