/**
 * Hybrid product search (semantic + keyword).
 *
 * 1. Query analysis: cleaned query + filters (best effort, falls back to the raw query)
 * 2. Filter translation into the vector store's native filter
 * 3. Retrieval:
 *    - semantic: embedding -> filtered vector query (always)
 *    - keyword: BM25 over the whole corpus, unfiltered (hybrid mode only)
 * 4. Reciprocal Rank Fusion of both id lists (hybrid mode only)
 * 5. Enrichment with relational product details
 *
 * Display data comes from the vector payloads, so a fused id the semantic
 * path never returned is dropped from the response. Keyword-only matches
 * therefore never surface, and filters reach the keyword path only through
 * that drop.
 */

import type {
  Embedder,
  HealthStatus,
  KeywordHit,
  NativeFilter,
  PointId,
  QueryAnalysis,
  QueryAnalyzer,
  SearchDocument,
  SearchLogger,
  SearchMethod,
  SearchMode,
  VectorHit,
  VectorStore,
} from '../../types/hybrid-search.types';
import type { SearchResponse } from '../../schemas/input.schema';
import { FilterTranslator } from '../utils/filter-translator';
import { KeywordIndex } from '../utils/keyword-index';
import { DEFAULT_RRF_K, reciprocalRankFusion } from '../utils/rank-fusion';
import { createConsoleLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import type { ResultEnrichment } from './result-enrichment';

/** Payload field holding the text indexed by the keyword path. */
export const DOCUMENT_FIELD = 'document';

export const SEARCH_METHODS: Record<SearchMode, SearchMethod> = {
  hybrid: 'hybrid (semantic+metadata+keyword)',
  semantic: 'semantic+metadata only',
};

export interface HybridSearchSettings {
  /** Final number of results. */
  topK: number;
  /** Candidates requested from each retrieval method before fusion. */
  retrievalSize: number;
  rrfK: number;
  scanBatchSize: number;
}

export const DEFAULT_SEARCH_SETTINGS: HybridSearchSettings = {
  topK: 5,
  retrievalSize: 20,
  rrfK: DEFAULT_RRF_K,
  scanBatchSize: 1000,
};

export interface HybridSearchDependencies {
  analyzer: QueryAnalyzer;
  embedder: Embedder;
  vectorStore: VectorStore;
  enrichment: ResultEnrichment;
  keywordIndex?: KeywordIndex;
  filterTranslator?: FilterTranslator;
  settings?: Partial<HybridSearchSettings>;
  logger?: SearchLogger;
}

export class HybridSearchService {
  private readonly analyzer: QueryAnalyzer;
  private readonly embedder: Embedder;
  private readonly vectorStore: VectorStore;
  private readonly enrichment: ResultEnrichment;
  private readonly keywordIndex: KeywordIndex;
  private readonly filterTranslator: FilterTranslator;
  private readonly settings: HybridSearchSettings;
  private readonly logger: SearchLogger;

  // Single-initialization guard: every caller awaits the same build
  private keywordIndexBuild: Promise<void> | null = null;
  private keywordIndexGeneration = 0;

  constructor(dependencies: HybridSearchDependencies) {
    this.logger = dependencies.logger ?? createConsoleLogger('HybridSearch');
    this.analyzer = dependencies.analyzer;
    this.embedder = dependencies.embedder;
    this.vectorStore = dependencies.vectorStore;
    this.enrichment = dependencies.enrichment;
    this.keywordIndex = dependencies.keywordIndex ?? new KeywordIndex({ logger: this.logger });
    this.filterTranslator = dependencies.filterTranslator ?? new FilterTranslator({ logger: this.logger });
    this.settings = { ...DEFAULT_SEARCH_SETTINGS, ...dependencies.settings };
  }

  async search(rawQuery: string, mode: SearchMode = 'semantic'): Promise<SearchResponse> {
    const startTime = Date.now();
    const analysis = await this.analyze(rawQuery);
    const searchQuery = analysis.search_query;
    const nativeFilter = this.filterTranslator.translate(analysis.filters);

    this.logger.info(`Search query: "${searchQuery}"`, {
      filters: analysis.filters,
      native_filter: nativeFilter,
      mode,
    });

    let hits: VectorHit[];

    if (mode === 'hybrid') {
      const { retrievalSize, topK, rrfK } = this.settings;
      const [semanticHits, keywordHits] = await Promise.all([
        this.semanticSearch(searchQuery, nativeFilter, retrievalSize),
        this.keywordSearch(searchQuery, retrievalSize),
      ]);

      this.logger.info(`Semantic (with filters): ${semanticHits.length} results`);
      this.logger.info(`BM25 (keyword): ${keywordHits.length} results`);

      hits = this.fuse(semanticHits, keywordHits, topK, rrfK);
    } else {
      hits = await this.semanticSearch(searchQuery, nativeFilter, this.settings.topK);
    }

    const results = await this.enrichment.enrich(hits);

    this.logger.info(`Search completed: ${results.length} results | ${Date.now() - startTime}ms`);

    return {
      query: rawQuery,
      analyzed_query: searchQuery,
      filters_detected: analysis.filters,
      search_method: SEARCH_METHODS[mode],
      results,
      total_results: results.length,
    };
  }

  async health(): Promise<HealthStatus> {
    try {
      const indexedCount = await this.vectorStore.count();
      return {
        status: 'healthy',
        indexed_count: indexedCount,
        collection: this.vectorStore.collectionName,
        keyword_index: this.keywordIndex.stats(),
      };
    } catch (error) {
      this.logger.error('Search health check failed', { error: errorMessage(error) });
      return { status: 'unhealthy', indexed_count: 0, error: errorMessage(error) };
    }
  }

  /**
   * Builds the keyword index from a full corpus scan at most once. Concurrent
   * callers share the in-flight build; a failed build is forgotten so the
   * next caller retries.
   */
  ensureKeywordIndex(): Promise<void> {
    if (!this.keywordIndexBuild) {
      const generation = this.keywordIndexGeneration;
      this.keywordIndexBuild = this.buildKeywordIndex(generation).catch((error: unknown) => {
        if (generation === this.keywordIndexGeneration) {
          this.keywordIndexBuild = null;
        }
        throw error;
      });
    }

    return this.keywordIndexBuild;
  }

  /** Marks the keyword index stale; the next hybrid search rebuilds it. */
  resetKeywordIndex(): void {
    this.keywordIndexGeneration += 1;
    this.keywordIndexBuild = null;
  }

  private async analyze(rawQuery: string): Promise<QueryAnalysis> {
    try {
      return await this.analyzer.analyze(rawQuery);
    } catch (error) {
      this.logger.warn('Query analysis failed, searching with the raw query and no filters', {
        error: errorMessage(error),
      });
      return { search_query: rawQuery, filters: {} };
    }
  }

  private async semanticSearch(query: string, filter: NativeFilter | null, limit: number): Promise<VectorHit[]> {
    const embedding = await this.embedder.embed(query);
    return this.vectorStore.query(embedding, limit, filter);
  }

  private async keywordSearch(query: string, limit: number): Promise<KeywordHit[]> {
    await this.ensureKeywordIndex();
    return this.keywordIndex.search(query, limit);
  }

  private fuse(semanticHits: VectorHit[], keywordHits: KeywordHit[], topK: number, rrfK: number): VectorHit[] {
    const fused = reciprocalRankFusion(
      [semanticHits.map((hit) => hit.id), keywordHits.map((hit) => hit.id)],
      topK,
      rrfK,
    );

    const semanticById = new Map<PointId, VectorHit>(semanticHits.map((hit) => [hit.id, hit]));
    const hits = fused.flatMap((entry) => {
      const hit = semanticById.get(entry.id);
      return hit ? [{ ...hit, score: entry.score }] : [];
    });

    if (hits.length < fused.length) {
      this.logger.debug(`Dropped ${fused.length - hits.length} keyword-only ids without vector payload`);
    }
    this.logger.info(`RRF Fusion: ${hits.length} final results`);

    return hits;
  }

  private async buildKeywordIndex(generation: number): Promise<void> {
    this.logger.info('Initializing BM25 index (first hybrid search)...');
    const documents: SearchDocument[] = [];

    for await (const point of this.vectorStore.scan(this.settings.scanBatchSize)) {
      const text = point.payload[DOCUMENT_FIELD];
      if (typeof text === 'string' && text.length > 0) {
        documents.push({ id: point.id, text });
      }
    }

    if (generation !== this.keywordIndexGeneration) {
      this.logger.info('Keyword index was reset during the build, discarding scanned corpus');
      return;
    }

    this.logger.info(`Retrieved ${documents.length} documents for BM25 indexing`);
    this.keywordIndex.build(documents);
  }
}
