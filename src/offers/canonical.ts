/**
 * Canonical offers for one SKU: dedupe, price, classify.
 */

import { createLogger } from '../utils/logger';
import { readNumber, readText } from '../utils/fields';
import { parseMoney } from '../pricing/money';
import { resolveOfferUnitPrice } from '../pricing/unit-price';
import { classifyOffer } from '../gouging/classifier';
import { dedupeOffers, sellerIdentityKey } from './dedupe';
import type { GougingThresholds } from '../gouging/classifier';
import type { Baseline, CanonicalOffer, SellerOffer } from '../types';

const logger = createLogger('canonical');

export interface SkuOffers {
  asin: string;
  primaryOffers: readonly SellerOffer[];
  marketOffers: readonly SellerOffer[];
  baseline: Baseline;
}

export function canonicalizeOffers(sku: SkuOffers, thresholds: GougingThresholds): CanonicalOffer[] {
  const result: CanonicalOffer[] = [];

  for (const offer of dedupeOffers(sku.primaryOffers, sku.marketOffers)) {
    const sellerName = readText(offer.seller_name);
    if (!sellerName) continue;

    const unitPrice = resolveOfferUnitPrice(offer);
    if (unitPrice === undefined) {
      logger.debug({ asin: sku.asin, seller: sellerName, price: offer.price }, 'Offer price could not be parsed');
    }

    const classification = classifyOffer(unitPrice, sku.baseline.price, offer.price_flag, thresholds);
    const upstreamFlag = readText(offer.price_flag);

    result.push({
      asin: sku.asin,
      sellerKey: sellerIdentityKey(offer),
      sellerName,
      listedPrice: parseMoney(offer.price),
      unitPrice,
      baselineUnitPrice: sku.baseline.price,
      baselineSource: sku.baseline.source,
      deltaAbs: classification.deltaAbs,
      deltaPct: classification.deltaPct,
      classified: classification.classified,
      isGouging: classification.isGouging,
      upstreamFair: classification.upstreamFair,
      upstreamFlag: upstreamFlag || undefined,
      positiveRatingPct: readNumber(offer.positive_rating_percent),
    });
  }

  return result;
}
