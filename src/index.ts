/**
 * Pricewatch - price normalization and gouging detection engine
 */

export {
  summarizeCatalog,
  shardFamilies,
  aggregateShard,
  resolveEngineOptions,
  DEFAULT_ENGINE_OPTIONS,
} from './engine/index';
export { createAggregator, foldFamily, mergeAggregators } from './aggregate/aggregator';
export { buildSummary } from './aggregate/summary';
export { healthScore, propBadSellers, HEALTH_WEIGHTS } from './aggregate/health';
export { Money, parseMoney, UNIT_PRICE_SCALE } from './pricing/money';
export { inferPackCount, inferPackCountWithRule } from './pricing/pack-count';
export { computeUnitPrice, listingUnitPrice, resolveOfferUnitPrice } from './pricing/unit-price';
export { selectBaseline } from './pricing/baseline';
export { dedupeOffers, sellerIdentityKey } from './offers/dedupe';
export { canonicalizeOffers } from './offers/canonical';
export { classifyOffer } from './gouging/classifier';
export { loadSnapshot, parseSnapshot } from './ingest/snapshot';
export { writeSummary, serializeSummary } from './export/writer';
export { runSummarize } from './commands/summarize';
export { PricewatchError, SourceUnavailableError, OutputWriteError } from './errors';

export { FLAG_PRICE_GOUGING, FLAG_FAIR_PRICE } from './types';
export type * from './types';
export type { Aggregator } from './aggregate/aggregator';
export type { PackCountResult, PackCountRule } from './pricing/pack-count';
export type { Classification, GougingThresholds } from './gouging/classifier';
