/**
 * Model configuration shared by the embedder and the query analyzer.
 * The embedding dimension must match the vector collection.
 */
export const MODELS = {
  // Query analysis: deterministic JSON extraction
  QUERY_ANALYZER: 'gpt-4o-mini',

  // Embeddings for products and queries
  EMBEDDINGS: 'text-embedding-3-small',
  EMBEDDING_DIMENSION: 1536,
} as const;

export const MODEL_CONFIGS = {
  QUERY_ANALYSIS: {
    temperature: 0,
    maxTokens: 500,
  },
} as const;
