/**
 * Fixed-point money values and the monetary parser.
 *
 * Prices arrive as JSON numbers, numeric strings, or strings with a currency
 * symbol and thousands separators. Everything is held as a scaled bigint so
 * that unit prices and deltas are exact decimal arithmetic, not binary floats.
 */

// =============================================================================
// MONEY
// =============================================================================

/** Fractional digits kept on unit prices. */
export const UNIT_PRICE_SCALE = 4;

/** Inputs with more significant digits than this are treated as overflow. */
const MAX_DIGITS = 30;

const NUMERIC_RE = /^([+-])?(\d+)(?:\.(\d*))?(?:e([+-]?\d+))?$/i;
const LEADING_DOT_RE = /^([+-])?\.(\d+)(?:e([+-]?\d+))?$/i;

function pow10(n: number): bigint {
  return 10n ** BigInt(n);
}

/**
 * Divide with round-half-up (ties away from zero).
 */
function divRound(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) throw new RangeError('Division by zero');
  const negative = (numerator < 0n) !== (denominator < 0n);
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;
  const q = n / d;
  const r = n % d;
  const rounded = r * 2n >= d ? q + 1n : q;
  return negative ? -rounded : rounded;
}

export class Money {
  /** value = units / 10^scale */
  readonly units: bigint;
  readonly scale: number;

  constructor(units: bigint, scale: number) {
    this.units = units;
    this.scale = scale;
  }

  /** Re-express at another scale, rounding half-up when digits are dropped. */
  rescale(scale: number): Money {
    if (scale === this.scale) return this;
    if (scale > this.scale) {
      return new Money(this.units * pow10(scale - this.scale), scale);
    }
    return new Money(divRound(this.units, pow10(this.scale - scale)), scale);
  }

  sub(other: Money): Money {
    const scale = Math.max(this.scale, other.scale);
    return new Money(this.rescale(scale).units - other.rescale(scale).units, scale);
  }

  mulInt(n: number | bigint): Money {
    return new Money(this.units * BigInt(n), this.scale);
  }

  /** this / divisor, quantized to `scale` fractional digits. */
  divInt(divisor: number | bigint, scale = UNIT_PRICE_SCALE): Money {
    const d = BigInt(divisor);
    // units / 10^s / d  ==  units * 10^scale / (10^s * d)  at the target scale
    return new Money(divRound(this.units * pow10(scale), pow10(this.scale) * d), scale);
  }

  /** this / other, quantized to `scale` fractional digits. */
  div(other: Money, scale: number): Money {
    return new Money(
      divRound(this.units * pow10(other.scale + scale), other.units * pow10(this.scale)),
      scale,
    );
  }

  compare(other: Money): number {
    const scale = Math.max(this.scale, other.scale);
    const a = this.rescale(scale).units;
    const b = other.rescale(scale).units;
    return a < b ? -1 : a > b ? 1 : 0;
  }

  gte(other: Money): boolean {
    return this.compare(other) >= 0;
  }

  lt(other: Money): boolean {
    return this.compare(other) < 0;
  }

  isZero(): boolean {
    return this.units === 0n;
  }

  isPositive(): boolean {
    return this.units > 0n;
  }

  toString(): string {
    const negative = this.units < 0n;
    const digits = (negative ? -this.units : this.units).toString();
    if (this.scale === 0) return (negative ? '-' : '') + digits;
    const padded = digits.padStart(this.scale + 1, '0');
    const int = padded.slice(0, padded.length - this.scale);
    const frac = padded.slice(padded.length - this.scale);
    return `${negative ? '-' : ''}${int}.${frac}`;
  }

  toNumber(): number {
    return Number(this.toString());
  }
}

// =============================================================================
// PARSER
// =============================================================================

function cleanNumericText(raw: string): string {
  let text = raw.trim();
  // "$12.99", "USD 12.99", "1,299.00"
  text = text.replace(/^(?:usd|us\$|\$)\s*/i, '');
  if (/^[+-]?\d{1,3}(?:,\d{3})+(?:\.\d*)?$/.test(text)) {
    text = text.replace(/,/g, '');
  }
  return text;
}

/**
 * Parse any price-like value into Money.
 *
 * Returns undefined for null, booleans, objects, non-numeric text, NaN,
 * infinities and values too large to represent. Never throws.
 */
export function parseMoney(value: unknown): Money | undefined {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return undefined;
    text = String(value);
  } else if (typeof value === 'string') {
    text = cleanNumericText(value);
  } else if (typeof value === 'bigint') {
    text = value.toString();
  } else {
    return undefined;
  }
  if (!text) return undefined;

  let sign: string | undefined;
  let intPart: string;
  let fracPart: string;
  let exponent: string | undefined;

  const match = NUMERIC_RE.exec(text);
  if (match) {
    [, sign, intPart, fracPart = '', exponent] = match;
  } else {
    const dotMatch = LEADING_DOT_RE.exec(text);
    if (!dotMatch) return undefined;
    [, sign, fracPart, exponent] = dotMatch;
    intPart = '0';
  }

  const exp = exponent === undefined ? 0 : Number(exponent);
  if (!Number.isSafeInteger(exp) || Math.abs(exp) > MAX_DIGITS) return undefined;

  const digits = (intPart + fracPart).replace(/^0+(?=\d)/, '');
  if (digits.length > MAX_DIGITS) return undefined;

  let units = BigInt(digits);
  let scale = fracPart.length - exp;
  if (scale < 0) {
    units *= pow10(-scale);
    scale = 0;
  }
  if (units.toString().length > MAX_DIGITS) return undefined;
  return new Money(sign === '-' ? -units : units, scale);
}
