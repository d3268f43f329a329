import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig, toEngineOptions } from './config';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      pctThreshold: 20,
      absThreshold: 2,
      topN: 20,
      badSellerRatingPct: 50,
      excludedSellers: ['amazon.com', 'amazon', 'kind', 'kind snacks', 'kindsnacks'],
      shardCount: 1,
      inputFile: 'normalized_all_products.json',
      outputFile: 'normalized_metadata_summary.json',
    });
  });

  it('coerces environment values', () => {
    const config = loadConfig({
      GOUGING_PCT_THRESHOLD: '25',
      GOUGING_ABS_THRESHOLD: '1.5',
      TOP_N: '10',
      EXCLUDED_SELLERS: 'Amazon.com, KIND Snacks,,',
      SHARD_COUNT: '4',
    });
    expect(config.pctThreshold).toBe(25);
    expect(config.absThreshold).toBe(1.5);
    expect(config.topN).toBe(10);
    expect(config.excludedSellers).toEqual(['amazon.com', 'kind snacks']);
    expect(toEngineOptions(config)).toEqual({
      pctThreshold: 25,
      absThreshold: 1.5,
      topN: 10,
      badSellerRatingPct: 50,
      excludedSellers: ['amazon.com', 'kind snacks'],
      shardCount: 4,
    });
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ TOP_N: '  ' }).topN).toBe(20);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ TOP_N: 'many' })).toThrow(ZodError);
    expect(() => loadConfig({ SHARD_COUNT: '0' })).toThrow(ZodError);
    expect(() => loadConfig({ BAD_SELLER_RATING_PCT: '150' })).toThrow(ZodError);
  });
});
