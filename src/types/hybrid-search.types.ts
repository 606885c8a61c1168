/**
 * Type definitions for hybrid search (vector + BM25)
 * Shared by the keyword index, filter translator, rank fusion and the search service.
 */

import type { FilterExpression, FilterSet } from '../schemas/filter.schema';

export type { FilterExpression, FilterSet };

/** Point id as accepted by the vector store (unsigned integer or UUID string). */
export type PointId = string | number;

export type PayloadValue = string | number | boolean | string[] | number[] | null;

export type Payload = Record<string, PayloadValue>;

/**
 * Unit indexed by both retrieval paths. `id` must be identical in the vector
 * store and the keyword index or fusion will not line up.
 */
export interface SearchDocument {
  id: PointId;
  text: string;
  payload?: Payload;
}

export interface KeywordHit {
  id: PointId;
  score: number;
}

export interface VectorHit {
  id: PointId;
  payload: Payload;
  score: number;
}

export interface FusedHit {
  id: PointId;
  score: number;
}

export interface StoredPoint {
  id: PointId;
  payload: Payload;
}

export interface VectorPoint extends StoredPoint {
  vector: number[];
}

export type SearchMode = 'hybrid' | 'semantic';

export type SearchMethod = 'hybrid (semantic+metadata+keyword)' | 'semantic+metadata only';

// Native filter: the subset of the Qdrant REST filter JSON the translator emits
export interface MatchValueCondition {
  value: string | number | boolean;
}

export interface MatchAnyCondition {
  any: string[] | number[];
}

export interface RangeCondition {
  gt?: number;
  gte?: number;
  lt?: number;
  lte?: number;
}

export type FieldCondition =
  | { key: string; match: MatchValueCondition | MatchAnyCondition }
  | { key: string; range: RangeCondition };

export interface NativeFilter {
  must: FieldCondition[];
}

export interface QueryAnalysis {
  search_query: string;
  filters: FilterSet;
}

export interface QueryAnalyzer {
  analyze(text: string): Promise<QueryAnalysis>;
}

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export interface VectorStore {
  readonly collectionName: string;
  upsert(points: VectorPoint[]): Promise<void>;
  query(vector: number[], limit: number, filter: NativeFilter | null): Promise<VectorHit[]>;
  count(): Promise<number>;
  scan(batchSize: number): AsyncIterable<StoredPoint>;
  clear(): Promise<void>;
}

export interface RelationalStore<TRecord> {
  batchGet(keys: string[]): Promise<Map<string, TRecord>>;
}

export interface SearchLogger {
  debug(message: string, args?: Record<string, unknown>): void;
  info(message: string, args?: Record<string, unknown>): void;
  warn(message: string, args?: Record<string, unknown>): void;
  error(message: string, args?: Record<string, unknown>): void;
}

export interface KeywordIndexStats {
  ready: boolean;
  total_documents: number;
  avg_doc_length: number;
}

export type HealthStatus =
  | {
      status: 'healthy';
      indexed_count: number;
      collection: string;
      keyword_index: KeywordIndexStats;
    }
  | {
      status: 'unhealthy';
      indexed_count: 0;
      error: string;
    };
