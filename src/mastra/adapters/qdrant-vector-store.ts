import { QdrantClient } from '@qdrant/js-client-rest';
import type {
  NativeFilter,
  Payload,
  PayloadValue,
  SearchLogger,
  StoredPoint,
  VectorHit,
  VectorPoint,
  VectorStore,
} from '../../types/hybrid-search.types';
import { VectorStoreError, errorMessage } from '../utils/errors';
import { createConsoleLogger } from '../utils/logger';

export interface QdrantVectorStoreOptions {
  url: string;
  apiKey?: string;
  collectionName: string;
  dimension: number;
  logger?: SearchLogger;
}

const isPayloadValue = (value: unknown): value is PayloadValue => {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return true;
  }
  if (!Array.isArray(value)) {
    return false;
  }
  return value.every((item) => typeof item === 'string') || value.every((item) => typeof item === 'number');
};

export const toPayload = (raw: Record<string, unknown> | null | undefined): Payload => {
  const payload: Payload = {};
  if (!raw) {
    return payload;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (isPayloadValue(value)) {
      payload[key] = value;
    }
  }
  return payload;
};

export class QdrantVectorStore implements VectorStore {
  readonly collectionName: string;
  private readonly client: QdrantClient;
  private readonly dimension: number;
  private readonly logger: SearchLogger;
  private collectionReady: Promise<void> | null = null;

  constructor(options: QdrantVectorStoreOptions) {
    this.collectionName = options.collectionName;
    this.dimension = options.dimension;
    this.logger = options.logger ?? createConsoleLogger('Qdrant');
    this.client = new QdrantClient({
      url: options.url,
      ...(options.apiKey ? { apiKey: options.apiKey } : {}),
      checkCompatibility: false,
    });
  }

  async upsert(points: VectorPoint[]): Promise<void> {
    if (points.length === 0) {
      return;
    }
    await this.ensureCollection();

    try {
      await this.client.upsert(this.collectionName, {
        wait: true,
        points: points.map((point) => ({ id: point.id, vector: point.vector, payload: point.payload })),
      });
    } catch (error) {
      throw new VectorStoreError(`Failed to add embeddings to Qdrant: ${errorMessage(error)}`, { cause: error });
    }
  }

  async query(vector: number[], limit: number, filter: NativeFilter | null): Promise<VectorHit[]> {
    await this.ensureCollection();
    const startTime = Date.now();

    try {
      const results = await this.client.search(this.collectionName, {
        vector,
        limit,
        with_payload: true,
        ...(filter && { filter }),
      });

      this.logger.debug(`Qdrant search returned ${results.length} points | ${Date.now() - startTime}ms`);

      return results.map((point) => ({
        id: point.id,
        payload: toPayload(point.payload),
        score: point.score,
      }));
    } catch (error) {
      throw new VectorStoreError(`Failed to query Qdrant: ${errorMessage(error)}`, { cause: error });
    }
  }

  async count(): Promise<number> {
    await this.ensureCollection();

    try {
      const { count } = await this.client.count(this.collectionName, { exact: true });
      return count;
    } catch (error) {
      throw new VectorStoreError(`Failed to count Qdrant points: ${errorMessage(error)}`, { cause: error });
    }
  }

  async *scan(batchSize: number): AsyncIterable<StoredPoint> {
    await this.ensureCollection();
    let offset: string | number | undefined;

    do {
      const page = await this.scrollPage(batchSize, offset);

      for (const point of page.points) {
        yield point;
      }

      offset = page.nextOffset;
    } while (offset !== undefined);
  }

  async clear(): Promise<void> {
    try {
      await this.client.deleteCollection(this.collectionName);
    } catch (error) {
      throw new VectorStoreError(`Failed to clear collection: ${errorMessage(error)}`, { cause: error });
    }
    this.collectionReady = null;
    await this.ensureCollection();
    this.logger.info(`Cleared collection: ${this.collectionName}`);
  }

  private async scrollPage(
    limit: number,
    offset: string | number | undefined,
  ): Promise<{ points: StoredPoint[]; nextOffset: string | number | undefined }> {
    try {
      const page = await this.client.scroll(this.collectionName, {
        limit,
        with_payload: true,
        with_vector: false,
        ...(offset !== undefined && { offset }),
      });
      const next = page.next_page_offset;

      return {
        points: page.points.map((point) => ({ id: point.id, payload: toPayload(point.payload) })),
        nextOffset: typeof next === 'string' || typeof next === 'number' ? next : undefined,
      };
    } catch (error) {
      throw new VectorStoreError(`Failed to retrieve documents: ${errorMessage(error)}`, { cause: error });
    }
  }

  private ensureCollection(): Promise<void> {
    if (!this.collectionReady) {
      this.collectionReady = this.createCollectionIfMissing().catch((error: unknown) => {
        this.collectionReady = null;
        throw error;
      });
    }
    return this.collectionReady;
  }

  private async createCollectionIfMissing(): Promise<void> {
    try {
      const { collections } = await this.client.getCollections();
      if (collections.some((collection) => collection.name === this.collectionName)) {
        this.logger.info(`Using existing Qdrant collection: ${this.collectionName}`);
        return;
      }

      await this.client.createCollection(this.collectionName, {
        vectors: { size: this.dimension, distance: 'Cosine' },
      });
      this.logger.info(`Created Qdrant collection: ${this.collectionName}`);
    } catch (error) {
      throw new VectorStoreError(`Error initializing collection: ${errorMessage(error)}`, { cause: error });
    }
  }
}
