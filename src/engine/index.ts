/**
 * Pricewatch Engine - one complete snapshot in, one summary out.
 *
 * Families share no state except the aggregates, so the snapshot can be split
 * into contiguous shards that are folded independently and merged in order.
 */

import { createLogger } from '../utils/logger';
import { createAggregator, foldFamily, mergeAggregators } from '../aggregate/aggregator';
import { buildSummary } from '../aggregate/summary';
import type { Aggregator } from '../aggregate/aggregator';
import type { EngineOptions, MarketplaceSummary, ProductFamily } from '../types';

const logger = createLogger('engine');

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  pctThreshold: 20,
  absThreshold: 2,
  topN: 20,
  badSellerRatingPct: 50,
  excludedSellers: ['amazon.com', 'amazon', 'kind', 'kind snacks', 'kindsnacks'],
  shardCount: 1,
};

/** Split into at most `count` contiguous, order-preserving shards. */
export function shardFamilies<T>(families: readonly T[], count: number): T[][] {
  const shards = Math.max(1, Math.min(Math.floor(count) || 1, families.length || 1));
  const size = Math.ceil(families.length / shards);
  const out: T[][] = [];
  for (let i = 0; i < shards; i++) {
    out.push(families.slice(i * size, (i + 1) * size));
  }
  return out;
}

export function aggregateShard(families: readonly ProductFamily[], options: EngineOptions): Aggregator {
  const agg = createAggregator();
  for (const family of families) foldFamily(agg, family, options);
  return agg;
}

/** Overrides left undefined keep the default. */
export function resolveEngineOptions(overrides: Partial<EngineOptions> = {}): EngineOptions {
  const d = DEFAULT_ENGINE_OPTIONS;
  return {
    pctThreshold: overrides.pctThreshold ?? d.pctThreshold,
    absThreshold: overrides.absThreshold ?? d.absThreshold,
    topN: overrides.topN ?? d.topN,
    badSellerRatingPct: overrides.badSellerRatingPct ?? d.badSellerRatingPct,
    excludedSellers: overrides.excludedSellers ?? d.excludedSellers,
    shardCount: overrides.shardCount ?? d.shardCount,
  };
}

export function summarizeCatalog(
  families: readonly ProductFamily[],
  overrides: Partial<EngineOptions> = {},
): MarketplaceSummary {
  const options = resolveEngineOptions(overrides);
  const shards = shardFamilies(families, options.shardCount);

  logger.info({ families: families.length, shards: shards.length }, 'Summarizing catalog');

  const agg = shards
    .map((shard) => aggregateShard(shard, options))
    .reduce((acc, next) => mergeAggregators(acc, next), createAggregator());

  const summary = buildSummary(agg, options);

  logger.info(
    {
      skus: summary.total_skus,
      listings: summary.total_listings,
      gouged: summary.total_gouged_listings,
      skippedVariants: summary.skipped_variants,
      unpricedListings: summary.unpriced_listings,
      healthScore: summary.marketplace_health_score,
    },
    'Catalog summarized',
  );

  return summary;
}
