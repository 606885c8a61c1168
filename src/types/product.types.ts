import { z } from 'zod';

const nullableString = z.string().nullish();

export const productCategorySchema = z.object({
  code: nullableString,
  description: nullableString,
});

export const productDimensionSchema = z.object({
  value: z.number().nullish(),
  unit: nullableString,
});

export const productFeatureSchema = z.object({
  feature_code: nullableString,
  feature_description: nullableString,
});

export const productSeriesSchema = z.object({
  description: nullableString,
});

/**
 * Catalog row as stored in the products table.
 * Dimensions are keyed by name: { height: { value: 30, unit: 'IN' } }.
 */
export const productRecordSchema = z.object({
  id: z.union([z.string().min(1), z.number().int().nonnegative()]),
  product_code: nullableString,
  base_price: z.coerce.number().nullish(),
  description: nullableString,
  categories: z.array(productCategorySchema).nullish(),
  dimensions: z.record(z.string(), productDimensionSchema).nullish(),
  features: z.array(productFeatureSchema).nullish(),
  series: productSeriesSchema.nullish(),
  multiple_series_flag: z.number().nullish(),
});

export type ProductRecord = z.infer<typeof productRecordSchema>;

/** Fields joined onto search results that the vector payload does not carry. */
export const productDetailsSchema = z.object({
  product_code: z.string(),
  series: productSeriesSchema.nullish(),
  features: z.array(productFeatureSchema).nullish(),
});

export type ProductDetails = z.infer<typeof productDetailsSchema>;
