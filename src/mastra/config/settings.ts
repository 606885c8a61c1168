import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import { MODELS } from './models';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const settingsSchema = z.object({
  OPENAI_API_KEY: optionalString,
  EMBEDDING_MODEL: z.string().default(MODELS.EMBEDDINGS),
  EMBEDDING_DIMENSION: positiveInt(MODELS.EMBEDDING_DIMENSION),
  QUERY_ANALYZER_MODEL: z.string().default(MODELS.QUERY_ANALYZER),

  QDRANT_URL: optionalString,
  QDRANT_API_KEY: optionalString,
  QDRANT_COLLECTION_NAME: z.string().default('products'),

  SUPABASE_URL: optionalString,
  SUPABASE_KEY: optionalString,
  PRODUCTS_TABLE: z.string().default('products'),

  SEARCH_TOP_K: positiveInt(5),
  HYBRID_RETRIEVAL_SIZE: positiveInt(20),
  RRF_K: positiveInt(60),
  KEYWORD_SCAN_BATCH_SIZE: positiveInt(1000),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  PORT: positiveInt(3000),
  LIBSQL_URL: optionalString,
  LIBSQL_AUTH_TOKEN: optionalString,
});

export type Settings = z.infer<typeof settingsSchema>;

export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
  const result = settingsSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return result.data;
};
