import { z } from 'zod';
import { filterSetSchema } from './filter.schema';

export const searchInputSchema = z.object({
  query: z.string().trim().min(1).max(1000),
  mode: z.enum(['hybrid', 'semantic']).default('semantic'),
});

export type SearchInput = z.infer<typeof searchInputSchema>;

export const featureSchema = z.object({
  feature_code: z.string().optional(),
  feature_description: z.string().optional(),
});

export const productResultSchema = z.object({
  product_code: z.string(),
  description: z.string(),
  base_price: z.number().nullable(),
  categories: z.array(z.string()),
  series: z.string().nullable(),
  features: z.array(featureSchema),
  score: z.number(),
});

export type ProductResult = z.infer<typeof productResultSchema>;

export const searchResponseSchema = z.object({
  query: z.string(),
  analyzed_query: z.string(),
  filters_detected: filterSetSchema,
  search_method: z.enum(['hybrid (semantic+metadata+keyword)', 'semantic+metadata only']),
  results: z.array(productResultSchema),
  total_results: z.number(),
});

export type SearchResponse = z.infer<typeof searchResponseSchema>;

export const embeddingRequestSchema = z.object({
  limit: z.number().int().min(1).max(10000).default(10),
  skip: z.number().int().min(0).default(0),
});

export type EmbeddingRequest = z.infer<typeof embeddingRequestSchema>;

export const previewQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(5),
});
