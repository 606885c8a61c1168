import { describe, it, expect, vi } from 'vitest';
import { SupabaseProductStore } from '../supabase-product-store';
import { ConfigurationError } from '../../utils/errors';
import type { SearchLogger } from '../../../types/hybrid-search.types';

const silentLogger = (): SearchLogger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe('SupabaseProductStore', () => {
  it('answers an empty lookup without a client', async () => {
    const store = new SupabaseProductStore({ table: 'products', logger: silentLogger() });

    expect(await store.batchGet([])).toEqual(new Map());
  });

  it('requires credentials before querying', async () => {
    const store = new SupabaseProductStore({ table: 'products', logger: silentLogger() });

    await expect(store.batchGet(['A1'])).rejects.toThrow(ConfigurationError);
    await expect(store.countProducts()).rejects.toThrow('Supabase credentials are not configured');
  });
});
