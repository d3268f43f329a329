/**
 * Gouging Classifier
 *
 * An offer is computed as gouging when its unit price is at least
 * `pctThreshold` percent AND at least `absThreshold` currency units above the
 * baseline. The upstream price flag then has the last word: "price gouging"
 * forces true, "fair price" forces false.
 */

import { parseMoney } from '../pricing/money';
import type { Money } from '../pricing/money';
import { FLAG_FAIR_PRICE, FLAG_PRICE_GOUGING } from '../types';

/** Fractional digits kept on percentage deltas. */
export const PCT_SCALE = 10;

export interface GougingThresholds {
  pctThreshold: number;
  absThreshold: number;
}

export interface Classification {
  deltaAbs: Money | undefined;
  deltaPct: Money | undefined;
  /** Both unit prices were present. */
  classified: boolean;
  computedGouging: boolean;
  isGouging: boolean;
  upstreamFair: boolean;
}

export function normalizeFlag(flag: unknown): string {
  return typeof flag === 'string' ? flag.trim().toLowerCase() : '';
}

/** (seller - baseline) / baseline x 100; undefined for a zero baseline. */
export function deltaPercent(deltaAbs: Money, baseline: Money): Money | undefined {
  if (baseline.isZero()) return undefined;
  return deltaAbs.mulInt(100).div(baseline, PCT_SCALE);
}

export function classifyOffer(
  sellerUnitPrice: Money | undefined,
  baselineUnitPrice: Money | undefined,
  upstreamFlag: unknown,
  thresholds: GougingThresholds,
): Classification {
  const flag = normalizeFlag(upstreamFlag);
  const upstreamFair = flag === FLAG_FAIR_PRICE;

  if (sellerUnitPrice === undefined || baselineUnitPrice === undefined) {
    return {
      deltaAbs: undefined,
      deltaPct: undefined,
      classified: false,
      computedGouging: false,
      isGouging: false,
      upstreamFair,
    };
  }

  const deltaAbs = sellerUnitPrice.sub(baselineUnitPrice);
  const deltaPct = deltaPercent(deltaAbs, baselineUnitPrice);

  const pctLimit = parseMoney(thresholds.pctThreshold);
  const absLimit = parseMoney(thresholds.absThreshold);
  const computedGouging =
    deltaPct !== undefined &&
    pctLimit !== undefined &&
    absLimit !== undefined &&
    deltaPct.gte(pctLimit) &&
    deltaAbs.gte(absLimit);

  let isGouging = computedGouging;
  if (flag === FLAG_PRICE_GOUGING) isGouging = true;
  else if (upstreamFair) isGouging = false;

  return { deltaAbs, deltaPct, classified: true, computedGouging, isGouging, upstreamFair };
}
