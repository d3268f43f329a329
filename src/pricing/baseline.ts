/**
 * Baseline Price Selector
 *
 * Picks the reference unit price a SKU's offers are measured against:
 *
 *   1. first primary offer whose seller name contains "amazon"   main_seller_amazon[_raw]
 *   2. first primary offer in list order                          main_seller_first[_raw]
 *   3. the variant's own computed unit price                      variant_unit_price
 *      (reached with no primary offers, or none of them priceable)
 *   4. nothing                                                    none
 *
 * Within 1 and 2 the offer's price is taken from its declared unit price
 * (when > 0), then its computed unit price, then its raw listed price; the
 * raw fallback carries the `_raw` tag.
 */

import { UNIT_PRICE_SCALE, parseMoney } from './money';
import { listingUnitPrice } from './unit-price';
import { readText } from '../utils/fields';
import type { Money } from './money';
import type { Baseline, BaselineSource, PrimaryOffer } from '../types';

type OfferTier = 'main_seller_amazon' | 'main_seller_first';

function offerPrice(offer: PrimaryOffer, tier: OfferTier): Baseline | undefined {
  const declared = parseMoney(offer.unit_price);
  if (declared !== undefined && declared.isPositive()) {
    return { price: declared.rescale(UNIT_PRICE_SCALE), source: tier };
  }
  const computed = listingUnitPrice(offer);
  if (computed !== undefined) {
    return { price: computed, source: tier };
  }
  // Not reached while inferPackCount returns a positive integer: any
  // parseable price already has a computed unit price above.
  const raw = parseMoney(offer.price);
  if (raw !== undefined) {
    const source: BaselineSource = tier === 'main_seller_amazon' ? 'main_seller_amazon_raw' : 'main_seller_first_raw';
    return { price: raw, source };
  }
  return undefined;
}

function isAmazonSeller(offer: PrimaryOffer): boolean {
  return readText(offer.seller_name).toLowerCase().includes('amazon');
}

export function selectBaseline(
  primaryOffers: readonly PrimaryOffer[],
  variantUnitPrice: Money | undefined,
): Baseline {
  const amazon = primaryOffers.find(isAmazonSeller);
  if (amazon) {
    const picked = offerPrice(amazon, 'main_seller_amazon');
    if (picked) return picked;
  }

  if (primaryOffers.length > 0) {
    const picked = offerPrice(primaryOffers[0], 'main_seller_first');
    if (picked) return picked;
  }

  if (variantUnitPrice !== undefined) {
    return { price: variantUnitPrice, source: 'variant_unit_price' };
  }

  return { price: undefined, source: 'none' };
}
