/**
 * Summary builder - turns a finished Aggregator into the output object.
 *
 * Every ordering here is deterministic: ties in ranked lists fall back to
 * the name, and top-gouged ties keep input order (Array.prototype.sort is
 * stable).
 */

import { compareText } from './aggregator';
import { healthScore, propBadSellers } from './health';
import type { Aggregator } from './aggregator';
import type {
  CategoryGougingRow,
  EngineOptions,
  MarketplaceSummary,
  SellerGougingRow,
  TopGougedEntry,
} from '../types';

// =============================================================================
// HELPERS
// =============================================================================

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

function max(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((m, v) => (v > m ? v : m), values[0]);
}

function safePct(numerator: number, denominator: number): number {
  return denominator ? (numerator / denominator) * 100 : 0;
}

function toRecord<V>(map: ReadonlyMap<string, V>): Record<string, V> {
  const out: Record<string, V> = {};
  for (const [k, v] of map) out[k] = v;
  return out;
}

// =============================================================================
// RANKED LISTS
// =============================================================================

export function rankTopGouged(candidates: readonly TopGougedEntry[], topN: number): TopGougedEntry[] {
  const key = (entry: TopGougedEntry): number => entry.price_delta_pct ?? Number.NEGATIVE_INFINITY;
  return [...candidates]
    .sort((a, b) => {
      const ka = key(a);
      const kb = key(b);
      return ka === kb ? 0 : ka < kb ? 1 : -1;
    })
    .slice(0, Math.max(0, topN));
}

export function buildCategorySummary(agg: Aggregator): CategoryGougingRow[] {
  const rows: CategoryGougingRow[] = [];
  for (const [category, stats] of agg.categoryStats) {
    rows.push({
      category,
      total_listings: stats.total,
      gouged_listings: stats.gouged,
      gouging_rate: safePct(stats.gouged, stats.total),
      avg_overprice_pct: mean(stats.pctList),
      avg_overprice_abs: mean(stats.absList),
    });
  }
  return rows.sort((a, b) => b.gouging_rate - a.gouging_rate || compareText(a.category, b.category));
}

export function buildSellerSummary(agg: Aggregator): SellerGougingRow[] {
  const rows: SellerGougingRow[] = [];
  for (const [seller, stats] of agg.sellerStats) {
    rows.push({
      seller_name: seller,
      gouged_listings: stats.gouged,
      avg_overprice_pct: mean(stats.gougedPctList),
    });
  }
  return rows.sort(
    (a, b) =>
      b.gouged_listings - a.gouged_listings ||
      b.avg_overprice_pct - a.avg_overprice_pct ||
      compareText(a.seller_name, b.seller_name),
  );
}

function buildSellerSkuImpact(agg: Aggregator): Record<string, number> {
  const entries = [...agg.sellerSkuImpact].map(([seller, asins]) => [seller, asins.size] as const);
  entries.sort((a, b) => b[1] - a[1] || compareText(a[0], b[0]));
  const out: Record<string, number> = {};
  for (const [seller, count] of entries) out[seller] = count;
  return out;
}

// =============================================================================
// SUMMARY
// =============================================================================

export function buildSummary(
  agg: Aggregator,
  options: Pick<EngineOptions, 'topN' | 'badSellerRatingPct' | 'excludedSellers'>,
): MarketplaceSummary {
  const excluded = new Set(options.excludedSellers.map((s) => s.trim().toLowerCase()));
  const uniqueSellers = [...agg.uniqueSellers].sort(compareText);
  const sellersExcludingMain = uniqueSellers.filter((s) => !excluded.has(s.toLowerCase()));

  const skuGougedMap: Record<string, string[]> = {};
  let skusImpacted = 0;
  for (const [asin, sellers] of agg.skuGougedMap) {
    skuGougedMap[asin] = [...sellers].sort(compareText);
    if (sellers.size > 0) skusImpacted += 1;
  }

  const marketplaceSkusPerCategory: Record<string, number> = {};
  for (const [category, asins] of agg.marketplaceAsinsPerCategory) {
    marketplaceSkusPerCategory[category] = asins.size;
  }

  const gougingRate = safePct(agg.totalGougedListings, agg.totalListings);
  const avgOverpricePct = mean(agg.pctDeltas);
  const badSellers = propBadSellers(agg.sellerRatings, options.badSellerRatingPct);

  return {
    total_products: agg.totalProducts,
    total_categories: agg.productsPerCategory.size,
    total_skus: agg.totalSkus,

    products_per_category: toRecord(agg.productsPerCategory),
    skus_per_category: toRecord(agg.skusPerCategory),
    marketplace_skus_per_category: marketplaceSkusPerCategory,

    total_unique_sellers: uniqueSellers.length,
    unique_sellers: uniqueSellers,
    unique_sellers_excluding_amazon_and_kind: sellersExcludingMain,
    total_unique_sellers_excluding_amazon_and_kind: sellersExcludingMain.length,

    seller_sku_impact: buildSellerSkuImpact(agg),
    price_flag_summary: toRecord(agg.priceFlagCounts),
    rating_tiers_summary: toRecord(agg.ratingTierCounts),

    top_gouged_skus: rankTopGouged(agg.candidates, options.topN),
    product_variant_summary: agg.productVariantSummary,

    total_listings: agg.totalListings,
    total_gouged_listings: agg.totalGougedListings,
    fair_price_listings: agg.fairPriceListings,
    unpriced_listings: agg.unpricedListings,
    skipped_variants: agg.skippedVariants,

    avg_overprice_pct: avgOverpricePct,
    avg_overprice_abs: mean(agg.absDeltas),
    max_overprice_pct: max(agg.pctDeltas),
    max_overprice_abs: max(agg.absDeltas),
    gouging_rate: gougingRate,

    sku_gouged_map: skuGougedMap,
    skus_impacted: skusImpacted,
    skus_impact_rate: safePct(skusImpacted, agg.totalSkus),

    category_gouging_summary: buildCategorySummary(agg),
    seller_gouging_summary: buildSellerSummary(agg),

    prop_bad_sellers: badSellers,
    marketplace_health_score: healthScore({
      gougingRate,
      avgOverpricePct,
      propBadSellers: badSellers,
    }),
  };
}
