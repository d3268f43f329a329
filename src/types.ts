/**
 * Pricewatch Types
 */

import type { Money } from './pricing/money';

export type {
  Variant,
  SellerOffer,
  PrimaryOffer,
  MarketOffer,
  ProductFamily,
  ListingLike,
} from './ingest/schema';

// =============================================================================
// PRICING
// =============================================================================

export type BaselineSource =
  | 'main_seller_amazon'
  | 'main_seller_amazon_raw'
  | 'main_seller_first'
  | 'main_seller_first_raw'
  | 'variant_unit_price'
  | 'none';

export interface Baseline {
  price: Money | undefined;
  source: BaselineSource;
}

export type RatingTier = 'excellent' | 'good' | 'mixed' | 'poor';

/** Upstream flags the classifier acts on, normalized to lower case. */
export const FLAG_PRICE_GOUGING = 'price gouging';
export const FLAG_FAIR_PRICE = 'fair price';

// =============================================================================
// CANONICAL OFFERS
// =============================================================================

export interface CanonicalOffer {
  asin: string;
  /** Lower-cased seller name + seller id/sku, joined by "|". */
  sellerKey: string;
  /** Trimmed display name. */
  sellerName: string;
  listedPrice: Money | undefined;
  unitPrice: Money | undefined;
  baselineUnitPrice: Money | undefined;
  baselineSource: BaselineSource;
  deltaAbs: Money | undefined;
  deltaPct: Money | undefined;
  /** Both unit prices were known, so deltas were computed. */
  classified: boolean;
  isGouging: boolean;
  /** Upstream flag said "fair price". */
  upstreamFair: boolean;
  /** Upstream flag as written in the snapshot, trimmed. */
  upstreamFlag: string | undefined;
  positiveRatingPct: number | undefined;
}

// =============================================================================
// OUTPUT
// =============================================================================

export interface TopGougedEntry {
  asin: string;
  product_name: string | null;
  title: string;
  category: string;
  seller_name: string;
  amazon_unit: number | null;
  seller_unit: number | null;
  amazon_price_source: BaselineSource;
  amazon_price_listing: number | null;
  seller_price_listing: number | null;
  price_delta_abs: number | null;
  price_delta_pct: number | null;
  detected_as_gouging: boolean;
  upstream_price_flag: string | null;
}

export interface CategoryGougingRow {
  category: string;
  total_listings: number;
  gouged_listings: number;
  gouging_rate: number;
  avg_overprice_pct: number;
  avg_overprice_abs: number;
}

export interface SellerGougingRow {
  seller_name: string;
  gouged_listings: number;
  avg_overprice_pct: number;
}

export interface ProductVariantSummary {
  product_name: string | null;
  category: string;
  variant_count: number;
  unique_sellers_in_product: string[];
}

export interface MarketplaceSummary {
  total_products: number;
  total_categories: number;
  total_skus: number;

  products_per_category: Record<string, number>;
  skus_per_category: Record<string, number>;
  marketplace_skus_per_category: Record<string, number>;

  total_unique_sellers: number;
  unique_sellers: string[];
  unique_sellers_excluding_amazon_and_kind: string[];
  total_unique_sellers_excluding_amazon_and_kind: number;

  seller_sku_impact: Record<string, number>;
  price_flag_summary: Record<string, number>;
  rating_tiers_summary: Record<string, number>;

  top_gouged_skus: TopGougedEntry[];
  product_variant_summary: ProductVariantSummary[];

  total_listings: number;
  total_gouged_listings: number;
  fair_price_listings: number;
  unpriced_listings: number;
  skipped_variants: number;

  avg_overprice_pct: number;
  avg_overprice_abs: number;
  max_overprice_pct: number;
  max_overprice_abs: number;
  gouging_rate: number;

  sku_gouged_map: Record<string, string[]>;
  skus_impacted: number;
  skus_impact_rate: number;

  category_gouging_summary: CategoryGougingRow[];
  seller_gouging_summary: SellerGougingRow[];

  prop_bad_sellers: number;
  marketplace_health_score: number;
}

// =============================================================================
// CONFIG
// =============================================================================

export interface EngineOptions {
  pctThreshold: number;
  absThreshold: number;
  topN: number;
  badSellerRatingPct: number;
  /** Lower-cased seller names left out of the "excluding" seller list. */
  excludedSellers: string[];
  shardCount: number;
}
