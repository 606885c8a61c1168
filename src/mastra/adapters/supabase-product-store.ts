import { createClient, SupabaseClient } from '@supabase/supabase-js';
import type { RelationalStore, SearchLogger } from '../../types/hybrid-search.types';
import { productDetailsSchema, type ProductDetails } from '../../types/product.types';
import { ConfigurationError, ProductStoreError } from '../utils/errors';
import { executeWithLogging } from '../utils/supabase-logger';
import { createConsoleLogger } from '../utils/logger';

/** Source of raw catalog rows for ingestion. */
export interface ProductCatalog {
  countProducts(): Promise<number>;
  listProducts(skip: number, limit: number): Promise<unknown[]>;
}

export interface SupabaseProductStoreOptions {
  url?: string;
  key?: string;
  table: string;
  logger?: SearchLogger;
}

export class SupabaseProductStore implements RelationalStore<ProductDetails>, ProductCatalog {
  private readonly url?: string;
  private readonly key?: string;
  private readonly table: string;
  private readonly logger: SearchLogger;
  private client: SupabaseClient | null = null;

  constructor(options: SupabaseProductStoreOptions) {
    this.url = options.url;
    this.key = options.key;
    this.table = options.table;
    this.logger = options.logger ?? createConsoleLogger('Supabase');
  }

  /** One query for every key; rows that fail validation are skipped. */
  async batchGet(keys: string[]): Promise<Map<string, ProductDetails>> {
    const details = new Map<string, ProductDetails>();
    if (keys.length === 0) {
      return details;
    }

    const supabase = this.getClient();
    const { data, error } = await executeWithLogging<unknown[]>(
      'batchGetProductDetails',
      this.table,
      { product_code: keys },
      () => supabase.from(this.table).select('product_code, series, features').in('product_code', keys),
      this.logger,
    );

    if (error) {
      throw new ProductStoreError(`Product details lookup failed: ${error.message}`, { cause: error });
    }

    for (const row of data ?? []) {
      const parsed = productDetailsSchema.safeParse(row);
      if (parsed.success) {
        details.set(parsed.data.product_code, parsed.data);
      } else {
        this.logger.warn('Skipping malformed product details row', { issues: parsed.error.issues.length });
      }
    }

    return details;
  }

  async countProducts(): Promise<number> {
    const supabase = this.getClient();
    const { count, error } = await executeWithLogging<unknown[]>(
      'countProducts',
      this.table,
      {},
      () => supabase.from(this.table).select('*', { count: 'exact', head: true }),
      this.logger,
    );

    if (error) {
      throw new ProductStoreError(`Product count failed: ${error.message}`, { cause: error });
    }

    return count ?? 0;
  }

  async listProducts(skip: number, limit: number): Promise<unknown[]> {
    const supabase = this.getClient();
    const { data, error } = await executeWithLogging<unknown[]>(
      'listProducts',
      this.table,
      { skip, limit },
      () =>
        supabase
          .from(this.table)
          .select('id, product_code, base_price, description, categories, dimensions, features, series, multiple_series_flag')
          .order('product_code', { ascending: true })
          .range(skip, skip + limit - 1),
      this.logger,
    );

    if (error) {
      throw new ProductStoreError(`Product listing failed: ${error.message}`, { cause: error });
    }

    return data ?? [];
  }

  private getClient(): SupabaseClient {
    if (!this.client) {
      if (!this.url || !this.key) {
        throw new ConfigurationError('Supabase credentials are not configured');
      }
      this.client = createClient(this.url, this.key);
    }

    return this.client;
  }
}
