import { describe, it, expect } from 'vitest';
import { classifyRatingTier, isBadSeller } from './ratings';

describe('classifyRatingTier', () => {
  it('buckets positive-rating percentages', () => {
    expect(classifyRatingTier(95)).toBe('excellent');
    expect(classifyRatingTier(90)).toBe('excellent');
    expect(classifyRatingTier('80')).toBe('good');
    expect(classifyRatingTier(50)).toBe('mixed');
    expect(classifyRatingTier(49.9)).toBe('poor');
  });

  it('returns undefined for unknown ratings', () => {
    expect(classifyRatingTier(null)).toBeUndefined();
    expect(classifyRatingTier('n/a')).toBeUndefined();
  });
});

describe('isBadSeller', () => {
  it('is strictly below the cutoff', () => {
    expect(isBadSeller(49.99, 50)).toBe(true);
    expect(isBadSeller(50, 50)).toBe(false);
  });
});
