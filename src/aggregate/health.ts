/**
 * Health Score Calculator
 */

import { isBadSeller } from '../gouging/ratings';

/** Fixed policy weights; not tuned from data. */
export const HEALTH_WEIGHTS = {
  gougingRate: 0.5,
  avgOverpricePct: 0.4,
  propBadSellers: 0.1,
} as const;

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Percentage of distinct rated sellers whose positive rating is below the cutoff.
 */
export function propBadSellers(sellerRatings: ReadonlyMap<string, number>, cutoffPct: number): number {
  if (sellerRatings.size === 0) return 0;
  let bad = 0;
  for (const rating of sellerRatings.values()) {
    if (isBadSeller(rating, cutoffPct)) bad += 1;
  }
  return (bad / sellerRatings.size) * 100;
}

export interface HealthInputs {
  gougingRate: number;
  avgOverpricePct: number;
  propBadSellers: number;
}

/**
 * 100 - 0.5*gouging_rate - 0.4*avg_overprice_pct - 0.1*prop_bad_sellers,
 * rounded to 2 decimals and clamped to [0, 100].
 */
export function healthScore(inputs: HealthInputs): number {
  const raw =
    100 -
    HEALTH_WEIGHTS.gougingRate * inputs.gougingRate -
    HEALTH_WEIGHTS.avgOverpricePct * inputs.avgOverpricePct -
    HEALTH_WEIGHTS.propBadSellers * inputs.propBadSellers;
  return clamp(round2(raw), 0, 100);
}
