import { describe, it, expect } from 'vitest';
import { createAggregator, foldFamily, mergeAggregators } from './aggregator';
import type { ProductFamily } from '../types';

const thresholds = { pctThreshold: 20, absThreshold: 2 };

function family(category: string, asin: string, sellerPrice: string, rating?: number): ProductFamily {
  return {
    product_name: `Product ${asin}`,
    category,
    variants: [{ asin, price: '5.00' }],
    main_seller: [],
    seller_market: [{ seller_name: 'QuickShip', asin, price: sellerPrice, positive_rating_percent: rating }],
  };
}

describe('foldFamily', () => {
  it('folds a family into the aggregator it is given', () => {
    const agg = createAggregator();
    const returned = foldFamily(agg, family('Snacks', 'A1', '7.50'), thresholds);

    expect(returned).toBe(agg);
    expect(agg.totalListings).toBe(1);
    expect(agg.totalGougedListings).toBe(1);
    expect(agg.pctDeltas).toEqual([50]);
    expect(agg.absDeltas).toEqual([2.5]);
    expect(agg.sellerStats.get('QuickShip')).toEqual({ gouged: 1, gougedPctList: [50] });
  });

  it('keeps non-gouged deltas out of the seller stats', () => {
    const agg = foldFamily(createAggregator(), family('Snacks', 'A1', '6.50'), thresholds);
    expect(agg.totalGougedListings).toBe(0);
    expect(agg.pctDeltas).toEqual([30]);
    expect(agg.sellerStats.size).toBe(0);
  });
});

describe('mergeAggregators', () => {
  it('adds counters, concatenates lists and unions sets', () => {
    const left = foldFamily(createAggregator(), family('Snacks', 'A1', '7.50', 40), thresholds);
    const right = foldFamily(createAggregator(), family('Snacks', 'A2', '10.00', 90), thresholds);

    const merged = mergeAggregators(left, right);

    expect(merged.totalProducts).toBe(2);
    expect(merged.totalListings).toBe(2);
    expect(merged.totalGougedListings).toBe(2);
    expect(merged.pctDeltas).toEqual([50, 100]);
    expect(merged.categoryStats.get('Snacks')).toEqual({
      total: 2,
      gouged: 2,
      pctList: [50, 100],
      absList: [2.5, 5],
    });
    expect(merged.sellerSkuImpact.get('QuickShip')).toEqual(new Set(['A1', 'A2']));
    expect(merged.candidates.map((c) => c.asin)).toEqual(['A1', 'A2']);
  });

  it('keeps the first known rating per seller', () => {
    const left = foldFamily(createAggregator(), family('Snacks', 'A1', '5', 40), thresholds);
    const right = foldFamily(createAggregator(), family('Snacks', 'A2', '5', 90), thresholds);
    expect(mergeAggregators(left, right).sellerRatings.get('QuickShip')).toBe(40);
    expect(mergeAggregators(right, left).sellerRatings.get('QuickShip')).toBe(90);
  });

  it('does not modify its inputs', () => {
    const left = foldFamily(createAggregator(), family('Snacks', 'A1', '7.50'), thresholds);
    const right = foldFamily(createAggregator(), family('Snacks', 'A2', '7.50'), thresholds);
    mergeAggregators(left, right);
    expect(left.totalListings).toBe(1);
    expect(left.categoryStats.get('Snacks')?.total).toBe(1);
    expect(left.sellerSkuImpact.get('QuickShip')?.size).toBe(1);
  });
});
