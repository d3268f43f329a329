import { describe, it, expect } from 'vitest';
import { inferPackCount, inferPackCountWithRule } from './pack-count';

describe('inferPackCount', () => {
  it('reads a structured dimension field first', () => {
    const result = inferPackCountWithRule({
      variant_dimensions: { number_of_items: '12 Count' },
      title: 'Pack of 6',
    });
    expect(result).toEqual({ count: 12, rule: 'dimension' });
  });

  it('skips a zero dimension value and tries the next key', () => {
    expect(inferPackCount({ variant_dimensions: { number_of_items: 0, count: '6' } })).toBe(6);
  });

  it('finds "Pack of N" and ignores a trailing ounce figure', () => {
    const result = inferPackCountWithRule({ title: 'Snack Bars Pack of 12, 1.4oz' });
    expect(result).toEqual({ count: 12, rule: 'pack_of' });
  });

  it('matches "pack N" without "of", case-insensitive', () => {
    expect(inferPackCount({ size: 'PACK 3' })).toBe(3);
  });

  it('tries the pack pattern on every field before the count pattern', () => {
    const result = inferPackCountWithRule({ size: '6 count', title: 'Nut Bars (Pack of 4)' });
    expect(result).toEqual({ count: 4, rule: 'pack_of' });
  });

  it('falls back to "N count|ct|pieces|pcs"', () => {
    expect(inferPackCountWithRule({ size: '24 ct' })).toEqual({ count: 24, rule: 'unit_count' });
    expect(inferPackCount({ title: 'Mints 50 pieces' })).toBe(50);
  });

  it('falls through a zero match to later fields', () => {
    expect(inferPackCount({ title: 'Pack of 0', variant_name: '3 pcs' })).toBe(3);
  });

  it('defaults to 1', () => {
    expect(inferPackCountWithRule({ title: 'Granola 12oz' })).toEqual({ count: 1, rule: 'default' });
    expect(inferPackCount({})).toBe(1);
    expect(inferPackCount({ variant_dimensions: 'twelve', title: 42 })).toBe(1);
  });
});
