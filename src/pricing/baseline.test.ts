import { describe, it, expect } from 'vitest';
import { selectBaseline } from './baseline';
import { parseMoney } from './money';

describe('selectBaseline', () => {
  it('prefers the first primary offer from an Amazon seller', () => {
    const baseline = selectBaseline(
      [
        { seller_name: 'Kind Snacks', price: '10.00' },
        { seller_name: 'Amazon.com', price: '24.00', title: 'Pack of 12' },
      ],
      parseMoney('3'),
    );
    expect(baseline.source).toBe('main_seller_amazon');
    expect(baseline.price?.toString()).toBe('2.0000');
  });

  it('uses the declared unit price of the Amazon offer when positive', () => {
    const baseline = selectBaseline([{ seller_name: 'AMAZON', price: '24.00', unit_price: '1.75' }], undefined);
    expect(baseline.source).toBe('main_seller_amazon');
    expect(baseline.price?.toString()).toBe('1.7500');
  });

  it('quantizes a declared baseline unit price to 4 fractional digits', () => {
    const baseline = selectBaseline([{ seller_name: 'Amazon.com', price: '12.00', unit_price: '1.000050' }], undefined);
    expect(baseline.price?.toString()).toBe('1.0001');
  });

  it('falls back to the first primary offer', () => {
    const baseline = selectBaseline(
      [
        { seller_name: 'Kind Snacks', price: '8' },
        { seller_name: 'Other', price: '1' },
      ],
      undefined,
    );
    expect(baseline.source).toBe('main_seller_first');
    expect(baseline.price?.toString()).toBe('8.0000');
  });

  it('uses the variant unit price with no primary offers', () => {
    const baseline = selectBaseline([], parseMoney('4.00')?.divInt(1));
    expect(baseline.source).toBe('variant_unit_price');
    expect(baseline.price?.toNumber()).toBe(4);
  });

  it('uses the variant unit price when no primary offer can be priced', () => {
    const baseline = selectBaseline([{ seller_name: 'Amazon', price: null }], parseMoney('4'));
    expect(baseline.source).toBe('variant_unit_price');
  });

  it('is undefined when nothing is priceable', () => {
    expect(selectBaseline([], undefined)).toEqual({ price: undefined, source: 'none' });
  });
});
