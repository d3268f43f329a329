/**
 * Structural schema for a catalog snapshot.
 *
 * Only the shape is enforced here (an array of family objects whose offer and
 * variant lists are arrays of objects). Scalar fields stay `unknown` and are
 * interpreted by the pricing rules, which absorb malformed values per record.
 */

import { z } from 'zod';

const listingFields = {
  price: z.unknown().optional(),
  unit_price: z.unknown().optional(),
  size: z.unknown().optional(),
  title: z.unknown().optional(),
  variant_name: z.unknown().optional(),
  variant_dimensions: z.unknown().optional(),
};

export const variantSchema = z
  .object({
    asin: z.unknown().optional(),
    ...listingFields,
  })
  .passthrough();

export const offerSchema = z
  .object({
    asin: z.unknown().optional(),
    seller_name: z.unknown().optional(),
    seller_id: z.unknown().optional(),
    seller_sku: z.unknown().optional(),
    price_flag: z.unknown().optional(),
    positive_rating_percent: z.unknown().optional(),
    rating_count: z.unknown().optional(),
    rating_stars: z.unknown().optional(),
    ...listingFields,
  })
  .passthrough();

export const productFamilySchema = z
  .object({
    product_name: z.unknown().optional(),
    category: z.unknown().optional(),
    variants: z.array(variantSchema).nullish(),
    main_seller: z.array(offerSchema).nullish(),
    seller_market: z.array(offerSchema).nullish(),
  })
  .passthrough();

export const snapshotSchema = z.array(productFamilySchema);

export type Variant = z.infer<typeof variantSchema>;
export type SellerOffer = z.infer<typeof offerSchema>;
/** Offer from the authorized/main seller list. */
export type PrimaryOffer = SellerOffer;
/** Offer from the marketplace seller list. */
export type MarketOffer = SellerOffer;
export type ProductFamily = z.infer<typeof productFamilySchema>;

/** Anything pack-count and unit-price rules can read. */
export type ListingLike = Variant | SellerOffer;
