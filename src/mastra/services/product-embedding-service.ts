import { z } from 'zod';
import type {
  Embedder,
  Payload,
  PointId,
  SearchLogger,
  VectorPoint,
  VectorStore,
} from '../../types/hybrid-search.types';
import { productRecordSchema, type ProductRecord } from '../../types/product.types';
import type { ProductCatalog } from '../adapters/supabase-product-store';
import { createConsoleLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { DOCUMENT_FIELD } from './hybrid-search-service';

export type ProcessResult =
  | { ok: true; point: VectorPoint; text: string }
  | { ok: false; product_code: string; reason: string };

export interface IngestionError {
  product_code?: string;
  batch_insert?: string;
  error?: string;
}

export interface IngestionReport {
  processed: number;
  successful: number;
  failed: number;
  errors: IngestionError[];
}

export interface EmbeddingStats {
  total_products: number;
  products_with_embeddings: number;
  products_without_embeddings: number;
  progress_percentage: number;
}

export interface ProductPreview {
  product_code: string;
  text_representation: string;
  payload: Payload;
}

const nonEmpty = (value: string | null | undefined): value is string =>
  typeof value === 'string' && value.length > 0;

const categoryDescriptions = (product: ProductRecord): string[] =>
  (product.categories ?? []).map((category) => category.description).filter(nonEmpty);

/**
 * Searchable text for a product: code, price, category descriptions,
 * description, dimensions, feature descriptions (codes are internal ids)
 * and series, joined with " | ".
 */
export const extractProductText = (product: ProductRecord): string => {
  const parts: string[] = [];

  if (product.product_code) {
    parts.push(`Product Code: ${product.product_code}`);
  }

  if (product.base_price) {
    parts.push(`Price: $${product.base_price}`);
  }

  const categories = categoryDescriptions(product);
  if (categories.length > 0) {
    parts.push(`Categories: ${categories.join(', ')}`);
  }

  if (product.description) {
    parts.push(`Description: ${product.description}`);
  }

  const dimensions = Object.entries(product.dimensions ?? {})
    .filter(([, dimension]) => Boolean(dimension.value))
    .map(([key, dimension]) => `${key}: ${dimension.value} ${dimension.unit ?? ''}`.trim());
  if (dimensions.length > 0) {
    parts.push(`Dimensions: ${dimensions.join(', ')}`);
  }

  const features = (product.features ?? []).map((feature) => feature.feature_description).filter(nonEmpty);
  if (features.length > 0) {
    parts.push(`Features: ${features.join('; ')}`);
  }

  if (product.series?.description) {
    parts.push(`Series: ${product.series.description}`);
  }

  return parts.join(' | ');
};

/** Vector payload: filterable metadata plus the text the keyword index reads. */
export const prepareProductPayload = (product: ProductRecord, text: string): Payload => {
  const payload: Payload = {
    product_code: product.product_code || 'unknown',
    base_price: product.base_price ?? 0,
    description: (product.description ?? '').slice(0, 500),
    categories: categoryDescriptions(product),
  };

  for (const [key, dimension] of Object.entries(product.dimensions ?? {})) {
    if (dimension.value !== null && dimension.value !== undefined) {
      payload[`${key}_value`] = dimension.value;
      payload[`${key}_unit`] = dimension.unit ?? '';
    }
  }

  if (product.series?.description) {
    payload.series = product.series.description.slice(0, 100);
  }

  payload.multiple_series_flag = product.multiple_series_flag ?? 0;
  payload.source_id = String(product.id);
  payload[DOCUMENT_FIELD] = text;

  return payload;
};

// Qdrant accepts unsigned integers and UUIDs as point ids
const pointIdSchema = z.union([
  z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  z.string().uuid(),
  z
    .string()
    .regex(/^\d+$/)
    .transform(Number)
    .pipe(z.number().max(Number.MAX_SAFE_INTEGER)),
]);

export const toPointId = (id: string | number): PointId | null => {
  const parsed = pointIdSchema.safeParse(id);
  return parsed.success ? parsed.data : null;
};

const productCodeOf = (raw: unknown): string => {
  if (typeof raw === 'object' && raw !== null && 'product_code' in raw && typeof raw.product_code === 'string') {
    return raw.product_code;
  }
  return 'unknown';
};

export interface ProductEmbeddingServiceOptions {
  catalog: ProductCatalog;
  embedder: Embedder;
  vectorStore: VectorStore;
  /** Called after new points are stored, so dependent indexes can rebuild. */
  onCorpusChanged?: () => void;
  logger?: SearchLogger;
}

export class ProductEmbeddingService {
  private readonly catalog: ProductCatalog;
  private readonly embedder: Embedder;
  private readonly vectorStore: VectorStore;
  private readonly onCorpusChanged?: () => void;
  private readonly logger: SearchLogger;

  constructor(options: ProductEmbeddingServiceOptions) {
    this.catalog = options.catalog;
    this.embedder = options.embedder;
    this.vectorStore = options.vectorStore;
    this.onCorpusChanged = options.onCorpusChanged;
    this.logger = options.logger ?? createConsoleLogger('ProductEmbedding');
  }

  async processProduct(raw: unknown): Promise<ProcessResult> {
    const parsed = productRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return {
        ok: false,
        product_code: productCodeOf(raw),
        reason: `Invalid product record: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}`,
      };
    }

    const product = parsed.data;
    const pointId = toPointId(product.id);
    if (pointId === null) {
      return {
        ok: false,
        product_code: product.product_code || 'unknown',
        reason: `Invalid point id "${product.id}": expected an unsigned integer or UUID`,
      };
    }

    const text = extractProductText(product);

    try {
      const vector = await this.embedder.embed(text);
      return {
        ok: true,
        text,
        point: { id: pointId, vector, payload: prepareProductPayload(product, text) },
      };
    } catch (error) {
      return { ok: false, product_code: product.product_code || 'unknown', reason: errorMessage(error) };
    }
  }

  /**
   * Embeds a page of catalog products and stores them in one batch.
   * Individual failures are reported and skipped; a failed batch insert
   * fails every point in it.
   */
  async ingestProducts(skip: number, limit: number): Promise<IngestionReport> {
    const rows = await this.catalog.listProducts(skip, limit);
    const points: VectorPoint[] = [];
    const errors: IngestionError[] = [];
    let processed = 0;
    let failed = 0;

    for (const row of rows) {
      const result = await this.processProduct(row);
      if (result.ok) {
        points.push(result.point);
        processed += 1;
      } else {
        failed += 1;
        errors.push({ product_code: result.product_code, error: result.reason });
        this.logger.warn(`Skipping product ${result.product_code}: ${result.reason}`);
      }
    }

    let successful = 0;
    if (points.length > 0) {
      try {
        this.logger.info(`Batch insert: storing ${points.length} embeddings in ${this.vectorStore.collectionName}`);
        await this.vectorStore.upsert(points);
        successful = points.length;
        this.onCorpusChanged?.();
      } catch (error) {
        this.logger.error(`Batch insert failed: ${errorMessage(error)}`);
        errors.push({ batch_insert: errorMessage(error) });
        failed = points.length;
      }
    }

    return { processed, successful, failed, errors };
  }

  async stats(): Promise<EmbeddingStats> {
    const [total, withEmbeddings] = await Promise.all([this.catalog.countProducts(), this.vectorStore.count()]);
    const progress = total > 0 ? (withEmbeddings / total) * 100 : 0;

    return {
      total_products: total,
      products_with_embeddings: withEmbeddings,
      products_without_embeddings: Math.max(0, total - withEmbeddings),
      progress_percentage: Number(progress.toFixed(2)),
    };
  }

  /** Text and payload each product would be stored with, without embedding. */
  async preview(limit: number): Promise<ProductPreview[]> {
    const rows = await this.catalog.listProducts(0, limit);
    const previews: ProductPreview[] = [];

    for (const row of rows) {
      const parsed = productRecordSchema.safeParse(row);
      if (!parsed.success) {
        continue;
      }
      const text = extractProductText(parsed.data);
      previews.push({
        product_code: parsed.data.product_code || 'unknown',
        text_representation: text,
        payload: prepareProductPayload(parsed.data, text),
      });
    }

    return previews;
  }

  async clear(): Promise<number> {
    const countBefore = await this.vectorStore.count();
    await this.vectorStore.clear();
    this.onCorpusChanged?.();
    return countBefore;
  }
}
