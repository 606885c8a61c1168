import type { SearchLogger, VectorStore } from '../../types/hybrid-search.types';
import { MemoryVectorStore } from '../adapters/memory-vector-store';
import { OpenAIEmbedder } from '../adapters/openai-embedder';
import { OpenAIQueryAnalyzer } from '../adapters/openai-query-analyzer';
import { QdrantVectorStore } from '../adapters/qdrant-vector-store';
import { SupabaseProductStore } from '../adapters/supabase-product-store';
import { HybridSearchService } from '../services/hybrid-search-service';
import { ProductEmbeddingService } from '../services/product-embedding-service';
import { ResultEnrichment } from '../services/result-enrichment';
import type { Settings } from './settings';

export interface SearchServices {
  vectorStore: VectorStore;
  search: HybridSearchService;
  embeddings: ProductEmbeddingService;
}

const createVectorStore = (settings: Settings, logger: SearchLogger): VectorStore => {
  if (!settings.QDRANT_URL) {
    logger.warn('QDRANT_URL is not set, using the in-process vector store');
    return new MemoryVectorStore(settings.QDRANT_COLLECTION_NAME, logger);
  }

  return new QdrantVectorStore({
    url: settings.QDRANT_URL,
    apiKey: settings.QDRANT_API_KEY,
    collectionName: settings.QDRANT_COLLECTION_NAME,
    dimension: settings.EMBEDDING_DIMENSION,
    logger,
  });
};

/** Wires every adapter and service once per process. */
export const createSearchServices = (settings: Settings, logger: SearchLogger): SearchServices => {
  const vectorStore = createVectorStore(settings, logger);
  const embedder = new OpenAIEmbedder({
    apiKey: settings.OPENAI_API_KEY,
    model: settings.EMBEDDING_MODEL,
    logger,
  });
  const productStore = new SupabaseProductStore({
    url: settings.SUPABASE_URL,
    key: settings.SUPABASE_KEY,
    table: settings.PRODUCTS_TABLE,
    logger,
  });

  const search = new HybridSearchService({
    analyzer: new OpenAIQueryAnalyzer({
      apiKey: settings.OPENAI_API_KEY,
      model: settings.QUERY_ANALYZER_MODEL,
      logger,
    }),
    embedder,
    vectorStore,
    enrichment: new ResultEnrichment(productStore, logger),
    settings: {
      topK: settings.SEARCH_TOP_K,
      retrievalSize: settings.HYBRID_RETRIEVAL_SIZE,
      rrfK: settings.RRF_K,
      scanBatchSize: settings.KEYWORD_SCAN_BATCH_SIZE,
    },
    logger,
  });

  const embeddings = new ProductEmbeddingService({
    catalog: productStore,
    embedder,
    vectorStore,
    onCorpusChanged: () => search.resetKeywordIndex(),
    logger,
  });

  return { vectorStore, search, embeddings };
};
