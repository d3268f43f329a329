/**
 * Aggregation Engine
 *
 * An Aggregator holds every counter and list the summary is built from. One
 * is created per shard, product families are folded into it one at a time,
 * and shards are combined with mergeAggregators. Counters add, lists
 * concatenate in shard order, sets union, and "first seen" maps keep the
 * left-hand entry, so folding shards in input order gives the same result
 * as a single sequential pass.
 */

import { createLogger } from '../utils/logger';
import { readNumber, readText } from '../utils/fields';
import { listingUnitPrice } from '../pricing/unit-price';
import { parseMoney } from '../pricing/money';
import { selectBaseline } from '../pricing/baseline';
import { canonicalizeOffers } from '../offers/canonical';
import { classifyRatingTier } from '../gouging/ratings';
import type { GougingThresholds } from '../gouging/classifier';
import type {
  CanonicalOffer,
  ProductFamily,
  ProductVariantSummary,
  SellerOffer,
  TopGougedEntry,
  Variant,
} from '../types';

const logger = createLogger('aggregator');

// =============================================================================
// TYPES
// =============================================================================

export interface CategoryStats {
  total: number;
  gouged: number;
  pctList: number[];
  absList: number[];
}

export interface SellerStats {
  gouged: number;
  /** delta_pct of this seller's gouged listings */
  gougedPctList: number[];
}

export interface Aggregator {
  totalProducts: number;
  totalSkus: number;
  skippedVariants: number;

  productsPerCategory: Map<string, number>;
  skusPerCategory: Map<string, number>;
  marketplaceAsinsPerCategory: Map<string, Set<string>>;

  uniqueSellers: Set<string>;
  sellerSkuImpact: Map<string, Set<string>>;
  priceFlagCounts: Map<string, number>;
  ratingTierCounts: Map<string, number>;
  productVariantSummary: ProductVariantSummary[];

  totalListings: number;
  totalGougedListings: number;
  fairPriceListings: number;
  unpricedListings: number;

  pctDeltas: number[];
  absDeltas: number[];

  categoryStats: Map<string, CategoryStats>;
  sellerStats: Map<string, SellerStats>;
  skuGougedMap: Map<string, Set<string>>;
  candidates: TopGougedEntry[];

  /** First known positive-rating percent per marketplace seller name. */
  sellerRatings: Map<string, number>;
}

export const UNKNOWN_CATEGORY = 'Unknown';

export function createAggregator(): Aggregator {
  return {
    totalProducts: 0,
    totalSkus: 0,
    skippedVariants: 0,
    productsPerCategory: new Map(),
    skusPerCategory: new Map(),
    marketplaceAsinsPerCategory: new Map(),
    uniqueSellers: new Set(),
    sellerSkuImpact: new Map(),
    priceFlagCounts: new Map(),
    ratingTierCounts: new Map(),
    productVariantSummary: [],
    totalListings: 0,
    totalGougedListings: 0,
    fairPriceListings: 0,
    unpricedListings: 0,
    pctDeltas: [],
    absDeltas: [],
    categoryStats: new Map(),
    sellerStats: new Map(),
    skuGougedMap: new Map(),
    candidates: [],
    sellerRatings: new Map(),
  };
}

// =============================================================================
// HELPERS
// =============================================================================

function increment(map: Map<string, number>, key: string, by = 1): void {
  map.set(key, (map.get(key) ?? 0) + by);
}

function addToSet<T>(map: Map<string, Set<T>>, key: string, value: T): void {
  const set = map.get(key);
  if (set) set.add(value);
  else map.set(key, new Set([value]));
}

function categoryStatsFor(agg: Aggregator, category: string): CategoryStats {
  let stats = agg.categoryStats.get(category);
  if (!stats) {
    stats = { total: 0, gouged: 0, pctList: [], absList: [] };
    agg.categoryStats.set(category, stats);
  }
  return stats;
}

function sellerStatsFor(agg: Aggregator, seller: string): SellerStats {
  let stats = agg.sellerStats.get(seller);
  if (!stats) {
    stats = { gouged: 0, gougedPctList: [] };
    agg.sellerStats.set(seller, stats);
  }
  return stats;
}

function offersFor(offers: readonly SellerOffer[], asin: string): SellerOffer[] {
  return offers.filter((o) => readText(o.asin) === asin);
}

// =============================================================================
// FOLD
// =============================================================================

interface FamilyContext {
  productName: string | null;
  category: string;
  variant: Variant;
}

function foldOffer(agg: Aggregator, ctx: FamilyContext, offer: CanonicalOffer): void {
  const { category } = ctx;
  const name = offer.sellerName;

  agg.uniqueSellers.add(name);
  addToSet(agg.sellerSkuImpact, name, offer.asin);
  if (offer.upstreamFlag) increment(agg.priceFlagCounts, offer.upstreamFlag);
  const tier = classifyRatingTier(offer.positiveRatingPct);
  if (tier) increment(agg.ratingTierCounts, tier);

  const stats = categoryStatsFor(agg, category);
  agg.totalListings += 1;
  stats.total += 1;
  if (offer.upstreamFair) agg.fairPriceListings += 1;

  if (!offer.classified) {
    agg.unpricedListings += 1;
    return;
  }

  const pct = offer.deltaPct?.toNumber();
  const abs = offer.deltaAbs?.toNumber();

  if (pct !== undefined) {
    agg.pctDeltas.push(pct);
    stats.pctList.push(pct);
  }
  if (abs !== undefined) {
    agg.absDeltas.push(abs);
    stats.absList.push(abs);
  }

  if (!offer.isGouging) return;

  agg.totalGougedListings += 1;
  stats.gouged += 1;
  const seller = sellerStatsFor(agg, name);
  seller.gouged += 1;
  if (pct !== undefined) seller.gougedPctList.push(pct);
  addToSet(agg.skuGougedMap, offer.asin, name);

  const variant = ctx.variant;
  agg.candidates.push({
    asin: offer.asin,
    product_name: ctx.productName,
    title: readText(variant.title) || readText(variant.variant_name) || offer.asin,
    category,
    seller_name: name,
    amazon_unit: offer.baselineUnitPrice?.toNumber() ?? null,
    seller_unit: offer.unitPrice?.toNumber() ?? null,
    amazon_price_source: offer.baselineSource,
    amazon_price_listing: parseMoney(variant.price)?.toNumber() ?? null,
    seller_price_listing: offer.listedPrice?.toNumber() ?? null,
    price_delta_abs: abs ?? null,
    price_delta_pct: pct ?? null,
    detected_as_gouging: offer.isGouging,
    upstream_price_flag: offer.upstreamFlag ?? null,
  });
}

/**
 * Fold one product family into the aggregator. Mutates and returns `agg`.
 */
export function foldFamily(agg: Aggregator, family: ProductFamily, thresholds: GougingThresholds): Aggregator {
  const productName = readText(family.product_name) || null;
  const category = readText(family.category) || UNKNOWN_CATEGORY;
  const variants = family.variants ?? [];
  const primaryOffers = family.main_seller ?? [];
  const marketOffers = family.seller_market ?? [];

  agg.totalProducts += 1;
  increment(agg.productsPerCategory, category);

  const marketSellerNames = new Set<string>();
  for (const offer of marketOffers) {
    const name = readText(offer.seller_name);
    if (!name) continue;
    marketSellerNames.add(name);
    const rating = readNumber(offer.positive_rating_percent);
    if (rating !== undefined && !agg.sellerRatings.has(name)) agg.sellerRatings.set(name, rating);
  }

  let keyedVariants = 0;
  for (const variant of variants) {
    const asin = readText(variant.asin);
    if (!asin) {
      agg.skippedVariants += 1;
      logger.debug({ product: productName }, 'Variant without asin skipped');
      continue;
    }
    keyedVariants += 1;

    const skuPrimary = offersFor(primaryOffers, asin);
    const skuMarket = offersFor(marketOffers, asin);

    if (skuMarket.length > 0) addToSet(agg.marketplaceAsinsPerCategory, category, asin);

    const baseline = selectBaseline(skuPrimary, listingUnitPrice(variant));
    const offers = canonicalizeOffers(
      { asin, primaryOffers: skuPrimary, marketOffers: skuMarket, baseline },
      thresholds,
    );

    const ctx: FamilyContext = { productName, category, variant };
    for (const offer of offers) foldOffer(agg, ctx, offer);
  }

  agg.totalSkus += keyedVariants;
  increment(agg.skusPerCategory, category, keyedVariants);

  agg.productVariantSummary.push({
    product_name: productName,
    category,
    variant_count: variants.length,
    unique_sellers_in_product: [...marketSellerNames].sort(compareText),
  });

  return agg;
}

// =============================================================================
// MERGE
// =============================================================================

export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function mergeCounts(a: Map<string, number>, b: Map<string, number>): Map<string, number> {
  const out = new Map(a);
  for (const [k, v] of b) increment(out, k, v);
  return out;
}

function mergeSets<T>(a: Map<string, Set<T>>, b: Map<string, Set<T>>): Map<string, Set<T>> {
  const out = new Map<string, Set<T>>();
  for (const [k, v] of a) out.set(k, new Set(v));
  for (const [k, v] of b) for (const item of v) addToSet(out, k, item);
  return out;
}

/** Combine two aggregators; `a` holds the earlier families. Inputs are not modified. */
export function mergeAggregators(a: Aggregator, b: Aggregator): Aggregator {
  const categoryStats = new Map<string, CategoryStats>();
  for (const [k, v] of a.categoryStats) {
    categoryStats.set(k, { total: v.total, gouged: v.gouged, pctList: [...v.pctList], absList: [...v.absList] });
  }
  for (const [k, v] of b.categoryStats) {
    const prev = categoryStats.get(k);
    if (prev) {
      prev.total += v.total;
      prev.gouged += v.gouged;
      prev.pctList.push(...v.pctList);
      prev.absList.push(...v.absList);
    } else {
      categoryStats.set(k, { total: v.total, gouged: v.gouged, pctList: [...v.pctList], absList: [...v.absList] });
    }
  }

  const sellerStats = new Map<string, SellerStats>();
  for (const [k, v] of a.sellerStats) sellerStats.set(k, { gouged: v.gouged, gougedPctList: [...v.gougedPctList] });
  for (const [k, v] of b.sellerStats) {
    const prev = sellerStats.get(k);
    if (prev) {
      prev.gouged += v.gouged;
      prev.gougedPctList.push(...v.gougedPctList);
    } else {
      sellerStats.set(k, { gouged: v.gouged, gougedPctList: [...v.gougedPctList] });
    }
  }

  const sellerRatings = new Map(a.sellerRatings);
  for (const [k, v] of b.sellerRatings) if (!sellerRatings.has(k)) sellerRatings.set(k, v);

  return {
    totalProducts: a.totalProducts + b.totalProducts,
    totalSkus: a.totalSkus + b.totalSkus,
    skippedVariants: a.skippedVariants + b.skippedVariants,
    productsPerCategory: mergeCounts(a.productsPerCategory, b.productsPerCategory),
    skusPerCategory: mergeCounts(a.skusPerCategory, b.skusPerCategory),
    marketplaceAsinsPerCategory: mergeSets(a.marketplaceAsinsPerCategory, b.marketplaceAsinsPerCategory),
    uniqueSellers: new Set([...a.uniqueSellers, ...b.uniqueSellers]),
    sellerSkuImpact: mergeSets(a.sellerSkuImpact, b.sellerSkuImpact),
    priceFlagCounts: mergeCounts(a.priceFlagCounts, b.priceFlagCounts),
    ratingTierCounts: mergeCounts(a.ratingTierCounts, b.ratingTierCounts),
    productVariantSummary: [...a.productVariantSummary, ...b.productVariantSummary],
    totalListings: a.totalListings + b.totalListings,
    totalGougedListings: a.totalGougedListings + b.totalGougedListings,
    fairPriceListings: a.fairPriceListings + b.fairPriceListings,
    unpricedListings: a.unpricedListings + b.unpricedListings,
    pctDeltas: [...a.pctDeltas, ...b.pctDeltas],
    absDeltas: [...a.absDeltas, ...b.absDeltas],
    categoryStats,
    sellerStats,
    skuGougedMap: mergeSets(a.skuGougedMap, b.skuGougedMap),
    candidates: [...a.candidates, ...b.candidates],
    sellerRatings,
  };
}
