import { describe, it, expect } from 'vitest';
import { classifyOffer, deltaPercent } from './classifier';
import { Money, parseMoney } from '../pricing/money';

const thresholds = { pctThreshold: 20, absThreshold: 2 };

function unit(value: string) {
  return parseMoney(value)?.divInt(1);
}

describe('classifyOffer', () => {
  it('does not flag a 30% markup that is only $1.50', () => {
    const result = classifyOffer(unit('6.50'), unit('5.00'), undefined, thresholds);
    expect(result.deltaAbs?.toNumber()).toBe(1.5);
    expect(result.deltaPct?.toNumber()).toBe(30);
    expect(result.computedGouging).toBe(false);
    expect(result.isGouging).toBe(false);
  });

  it('flags a 50% markup of $2.50', () => {
    const result = classifyOffer(unit('7.50'), unit('5.00'), undefined, thresholds);
    expect(result.deltaAbs?.toNumber()).toBe(2.5);
    expect(result.deltaPct?.toNumber()).toBe(50);
    expect(result.isGouging).toBe(true);
  });

  it('treats both thresholds as inclusive', () => {
    const result = classifyOffer(unit('12'), unit('10'), null, thresholds);
    expect(result.deltaPct?.toNumber()).toBe(20);
    expect(result.isGouging).toBe(true);
  });

  it('does not flag a large absolute delta under the percentage threshold', () => {
    const result = classifyOffer(unit('110'), unit('100'), undefined, thresholds);
    expect(result.deltaPct?.toNumber()).toBe(10);
    expect(result.isGouging).toBe(false);
  });

  it('never flags an offer the upstream flag calls fair', () => {
    const result = classifyOffer(unit('60'), unit('10'), 'Fair Price', thresholds);
    expect(result.deltaPct?.toNumber()).toBe(500);
    expect(result.deltaAbs?.toNumber()).toBe(50);
    expect(result.computedGouging).toBe(true);
    expect(result.isGouging).toBe(false);
    expect(result.upstreamFair).toBe(true);
  });

  it('always flags an offer the upstream flag calls gouging', () => {
    const result = classifyOffer(unit('5.10'), unit('5.00'), '  price GOUGING ', thresholds);
    expect(result.computedGouging).toBe(false);
    expect(result.isGouging).toBe(true);
  });

  it('cannot classify without both unit prices', () => {
    const result = classifyOffer(unit('9'), undefined, 'Fair Price', thresholds);
    expect(result).toEqual({
      deltaAbs: undefined,
      deltaPct: undefined,
      classified: false,
      computedGouging: false,
      isGouging: false,
      upstreamFair: true,
    });
    expect(classifyOffer(undefined, unit('9'), 'Price Gouging', thresholds).isGouging).toBe(false);
  });

  it('leaves delta_pct undefined for a zero baseline', () => {
    const result = classifyOffer(unit('3'), unit('0'), undefined, thresholds);
    expect(result.classified).toBe(true);
    expect(result.deltaAbs?.toNumber()).toBe(3);
    expect(result.deltaPct).toBeUndefined();
    expect(result.isGouging).toBe(false);
  });
});

describe('deltaPercent', () => {
  it('keeps ten fractional digits', () => {
    const pct = deltaPercent(new Money(1n, 0), new Money(3n, 0));
    expect(pct?.toString()).toBe('33.3333333333');
  });
});
