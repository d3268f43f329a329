/**
 * Configuration - loads and validates environment variables
 *
 * Loads .env from the working directory, then validates with zod.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import type { EngineOptions } from '../types';

dotenvConfig();

const sellerList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((s) => s.trim().toLowerCase())
      .filter((s) => s.length > 0),
  );

const configSchema = z.object({
  pctThreshold: z.coerce.number().nonnegative().default(20),
  absThreshold: z.coerce.number().nonnegative().default(2),
  topN: z.coerce.number().int().nonnegative().default(20),
  badSellerRatingPct: z.coerce.number().min(0).max(100).default(50),
  excludedSellers: sellerList.default('amazon.com,amazon,kind,kind snacks,kindsnacks'),
  shardCount: z.coerce.number().int().positive().default(1),
  inputFile: z.string().min(1).default('normalized_all_products.json'),
  outputFile: z.string().min(1).default('normalized_metadata_summary.json'),
});

export type AppConfig = z.infer<typeof configSchema>;

function envValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return configSchema.parse({
    pctThreshold: envValue(env, 'GOUGING_PCT_THRESHOLD'),
    absThreshold: envValue(env, 'GOUGING_ABS_THRESHOLD'),
    topN: envValue(env, 'TOP_N'),
    badSellerRatingPct: envValue(env, 'BAD_SELLER_RATING_PCT'),
    excludedSellers: envValue(env, 'EXCLUDED_SELLERS'),
    shardCount: envValue(env, 'SHARD_COUNT'),
    inputFile: envValue(env, 'INPUT_FILE'),
    outputFile: envValue(env, 'OUTPUT_FILE'),
  });
}

export function toEngineOptions(config: AppConfig): EngineOptions {
  return {
    pctThreshold: config.pctThreshold,
    absThreshold: config.absThreshold,
    topN: config.topN,
    badSellerRatingPct: config.badSellerRatingPct,
    excludedSellers: config.excludedSellers,
    shardCount: config.shardCount,
  };
}
