import { describe, it, expect } from 'vitest';
import { dedupeOffers, sellerIdentityKey } from './dedupe';

describe('sellerIdentityKey', () => {
  it('lower-cases the name and appends the seller id', () => {
    expect(sellerIdentityKey({ seller_name: ' Amazon.com ', seller_id: 'A1' })).toBe('amazon.com|A1');
  });

  it('falls back to the seller sku, then to an empty id', () => {
    expect(sellerIdentityKey({ seller_name: 'Shop', seller_sku: 'SKU9' })).toBe('shop|SKU9');
    expect(sellerIdentityKey({ seller_name: 'Shop' })).toBe('shop|');
  });
});

describe('dedupeOffers', () => {
  it('keeps the primary offer when the marketplace echoes it', () => {
    const primary = [{ seller_name: 'Amazon.com', seller_id: 'A1', price: '10' }];
    const market = [
      { seller_name: 'amazon.com', seller_id: 'A1', price: '9' },
      { seller_name: 'Amazon.com', seller_id: 'A2', price: '11' },
    ];

    const result = dedupeOffers(primary, market);

    expect(result).toHaveLength(2);
    expect(result[0]).toBe(primary[0]);
    expect(result[1]).toBe(market[1]);
  });

  it('collapses repeated marketplace offers to the first', () => {
    const market = [
      { seller_name: 'QuickShip', price: '5' },
      { seller_name: 'QUICKSHIP', price: '6' },
    ];
    const result = dedupeOffers([], market);
    expect(result).toHaveLength(1);
    expect(result[0].price).toBe('5');
  });

  it('treats different seller ids as different offers', () => {
    const market = [
      { seller_name: 'QuickShip', seller_id: 'Q1' },
      { seller_name: 'QuickShip', seller_id: 'Q2' },
    ];
    expect(dedupeOffers([], market)).toHaveLength(2);
  });
});
