/**
 * Pack-Count Inferencer
 *
 * Works out how many units a listing's price covers. Rules are tried in
 * order and the first that yields a count >= 1 wins:
 *
 *   1. dimension      variant_dimensions.{number_of_items, number_of_items_string, count, items}
 *                     with non-digits stripped
 *   2. pack_of        /pack\s*(?:of)?\s*(\d+)/i   in size, title, variant_name
 *   3. unit_count     /(\d+)\s*(?:count|ct|pieces|pcs)\b/i   in the same fields
 *   4. default        1
 *
 * A match that parses to 0 or to nothing falls through to the next rule.
 */

import { isRecord, readText } from '../utils/fields';
import type { ListingLike } from '../types';

// =============================================================================
// RULES
// =============================================================================

export type PackCountRule = 'dimension' | 'pack_of' | 'unit_count' | 'default';

export interface PackCountResult {
  count: number;
  rule: PackCountRule;
}

export const DIMENSION_KEYS = ['number_of_items', 'number_of_items_string', 'count', 'items'] as const;

/** Free-text fields, searched in this order. */
export const TEXT_FIELDS = ['size', 'title', 'variant_name'] as const;

const PACK_OF_RE = /pack\s*(?:of)?\s*(\d+)/i;
const UNIT_COUNT_RE = /(\d+)\s*(?:count|ct|pieces|pcs)\b/i;

function positiveInt(digits: string): number | undefined {
  if (!digits) return undefined;
  const n = Number.parseInt(digits, 10);
  return Number.isSafeInteger(n) && n >= 1 ? n : undefined;
}

function fromDimensions(listing: ListingLike): number | undefined {
  const dims = listing.variant_dimensions;
  if (!isRecord(dims)) return undefined;
  for (const key of DIMENSION_KEYS) {
    const text = readText(dims[key]);
    if (!text) continue;
    const n = positiveInt(text.replace(/\D/g, ''));
    if (n !== undefined) return n;
  }
  return undefined;
}

function fromText(listing: ListingLike, pattern: RegExp): number | undefined {
  for (const field of TEXT_FIELDS) {
    const text = readText(listing[field]);
    if (!text) continue;
    const match = pattern.exec(text);
    if (!match) continue;
    const n = positiveInt(match[1]);
    if (n !== undefined) return n;
  }
  return undefined;
}

// =============================================================================
// INFERENCE
// =============================================================================

export function inferPackCountWithRule(listing: ListingLike): PackCountResult {
  const dim = fromDimensions(listing);
  if (dim !== undefined) return { count: dim, rule: 'dimension' };

  const packOf = fromText(listing, PACK_OF_RE);
  if (packOf !== undefined) return { count: packOf, rule: 'pack_of' };

  const unitCount = fromText(listing, UNIT_COUNT_RE);
  if (unitCount !== undefined) return { count: unitCount, rule: 'unit_count' };

  return { count: 1, rule: 'default' };
}

/** Pack count for a listing; always >= 1. */
export function inferPackCount(listing: ListingLike): number {
  return inferPackCountWithRule(listing).count;
}
