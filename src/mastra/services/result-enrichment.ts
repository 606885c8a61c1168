import type { Payload, RelationalStore, SearchLogger, VectorHit } from '../../types/hybrid-search.types';
import type { ProductDetails } from '../../types/product.types';
import type { ProductResult } from '../../schemas/input.schema';
import { createConsoleLogger } from '../utils/logger';

export const JOIN_KEY = 'product_code';

const readString = (payload: Payload, key: string): string => {
  const value = payload[key];
  return typeof value === 'string' ? value : '';
};

const readNumber = (payload: Payload, key: string): number | null => {
  const value = payload[key];
  return typeof value === 'number' ? value : null;
};

const readStringList = (payload: Payload, key: string): string[] => {
  const value = payload[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return [...value].filter((item): item is string => typeof item === 'string');
};

const toFeatureList = (details: ProductDetails | undefined): ProductResult['features'] => {
  const features: ProductResult['features'] = [];

  for (const feature of details?.features ?? []) {
    const item: ProductResult['features'][number] = {};
    if (feature.feature_code) item.feature_code = feature.feature_code;
    if (feature.feature_description) item.feature_description = feature.feature_description;
    if (Object.keys(item).length > 0) {
      features.push(item);
    }
  }

  return features;
};

/**
 * Joins ranked hits with the relational store in a single batch lookup and
 * formats them as product results, preserving the incoming order. A hit with
 * no matching record keeps its payload fields and gets empty joined fields.
 */
export class ResultEnrichment {
  private readonly store: RelationalStore<ProductDetails>;
  private readonly logger: SearchLogger;

  constructor(store: RelationalStore<ProductDetails>, logger?: SearchLogger) {
    this.store = store;
    this.logger = logger ?? createConsoleLogger('ResultEnrichment');
  }

  async enrich(hits: VectorHit[]): Promise<ProductResult[]> {
    if (hits.length === 0) {
      return [];
    }

    const keys = Array.from(
      new Set(hits.map((hit) => readString(hit.payload, JOIN_KEY)).filter((key) => key.length > 0)),
    );
    const detailsByCode = keys.length > 0 ? await this.store.batchGet(keys) : new Map<string, ProductDetails>();

    const missing = keys.filter((key) => !detailsByCode.has(key));
    if (missing.length > 0) {
      this.logger.warn(`No product details for ${missing.length} of ${keys.length} results`, { product_codes: missing });
    }

    return hits.map((hit) => {
      const productCode = readString(hit.payload, JOIN_KEY);
      const details = productCode ? detailsByCode.get(productCode) : undefined;

      return {
        product_code: productCode,
        description: readString(hit.payload, 'description'),
        base_price: readNumber(hit.payload, 'base_price'),
        categories: readStringList(hit.payload, 'categories'),
        series: details?.series?.description ?? null,
        features: toFeatureList(details),
        score: Number(hit.score.toFixed(4)),
      };
    });
  }
}
