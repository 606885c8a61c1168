import type {
  FieldCondition,
  NativeFilter,
  Payload,
  PayloadValue,
  PointId,
  SearchLogger,
  StoredPoint,
  VectorHit,
  VectorPoint,
  VectorStore,
} from '../../types/hybrid-search.types';
import { cosineSimilarity } from '../utils/vector-search';
import { createConsoleLogger } from '../utils/logger';

type Scalar = string | number | boolean;

const fieldValues = (value: PayloadValue | undefined): Scalar[] => {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? [...value] : [value];
};

const matchesCondition = (payload: Payload, condition: FieldCondition): boolean => {
  const values = fieldValues(payload[condition.key]);

  if ('range' in condition) {
    const { gt, gte, lt, lte } = condition.range;
    return values.some(
      (value) =>
        typeof value === 'number' &&
        (gt === undefined || value > gt) &&
        (gte === undefined || value >= gte) &&
        (lt === undefined || value < lt) &&
        (lte === undefined || value <= lte),
    );
  }

  const { match } = condition;
  if ('any' in match) {
    const allowed: Scalar[] = [...match.any];
    return values.some((value) => allowed.includes(value));
  }

  return values.includes(match.value);
};

export const matchesFilter = (payload: Payload, filter: NativeFilter | null): boolean =>
  filter === null || filter.must.every((condition) => matchesCondition(payload, condition));

/**
 * In-process vector store with the same filter semantics as Qdrant for the
 * conditions the filter translator emits. Used when no Qdrant URL is set.
 */
export class MemoryVectorStore implements VectorStore {
  readonly collectionName: string;
  private readonly points = new Map<PointId, VectorPoint>();
  private readonly logger: SearchLogger;

  constructor(collectionName = 'products', logger?: SearchLogger) {
    this.collectionName = collectionName;
    this.logger = logger ?? createConsoleLogger('MemoryVectorStore');
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    for (const point of points) {
      this.points.set(point.id, { id: point.id, vector: [...point.vector], payload: { ...point.payload } });
    }
    this.logger.debug(`Upserted ${points.length} points into ${this.collectionName}`);
  }

  async query(vector: number[], limit: number, filter: NativeFilter | null): Promise<VectorHit[]> {
    const hits: VectorHit[] = [];

    for (const point of this.points.values()) {
      if (!matchesFilter(point.payload, filter)) {
        continue;
      }
      hits.push({ id: point.id, payload: { ...point.payload }, score: cosineSimilarity(vector, point.vector) });
    }

    hits.sort((a, b) => b.score - a.score);
    return hits.slice(0, limit);
  }

  async count(): Promise<number> {
    return this.points.size;
  }

  async *scan(batchSize: number): AsyncIterable<StoredPoint> {
    const snapshot = Array.from(this.points.values());
    const step = Math.max(1, batchSize);

    for (let offset = 0; offset < snapshot.length; offset += step) {
      for (const point of snapshot.slice(offset, offset + step)) {
        yield { id: point.id, payload: { ...point.payload } };
      }
    }
  }

  async clear(): Promise<void> {
    this.points.clear();
  }
}
