/**
 * Seller rating helpers
 */

import { readNumber } from '../utils/fields';
import type { RatingTier } from '../types';

export function classifyRatingTier(positivePct: unknown): RatingTier | undefined {
  const pct = readNumber(positivePct);
  if (pct === undefined) return undefined;
  if (pct >= 90) return 'excellent';
  if (pct >= 75) return 'good';
  if (pct >= 50) return 'mixed';
  return 'poor';
}

/** A seller counts as bad when its known positive rating is below the cutoff. */
export function isBadSeller(positivePct: number, cutoffPct: number): boolean {
  return positivePct < cutoffPct;
}
