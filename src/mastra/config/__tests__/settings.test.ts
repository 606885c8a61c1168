import { describe, it, expect } from 'vitest';
import { loadSettings } from '../settings';
import { ConfigurationError } from '../../utils/errors';

describe('loadSettings', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual({
      OPENAI_API_KEY: undefined,
      EMBEDDING_MODEL: 'text-embedding-3-small',
      EMBEDDING_DIMENSION: 1536,
      QUERY_ANALYZER_MODEL: 'gpt-4o-mini',
      QDRANT_URL: undefined,
      QDRANT_API_KEY: undefined,
      QDRANT_COLLECTION_NAME: 'products',
      SUPABASE_URL: undefined,
      SUPABASE_KEY: undefined,
      PRODUCTS_TABLE: 'products',
      SEARCH_TOP_K: 5,
      HYBRID_RETRIEVAL_SIZE: 20,
      RRF_K: 60,
      KEYWORD_SCAN_BATCH_SIZE: 1000,
      LOG_LEVEL: 'info',
      PORT: 3000,
      LIBSQL_URL: undefined,
      LIBSQL_AUTH_TOKEN: undefined,
    });
  });

  it('coerces numeric settings and treats blank strings as unset', () => {
    const settings = loadSettings({
      SEARCH_TOP_K: '10',
      RRF_K: '30',
      QDRANT_URL: '   ',
      OPENAI_API_KEY: 'test-secret',
    });

    expect(settings.SEARCH_TOP_K).toBe(10);
    expect(settings.RRF_K).toBe(30);
    expect(settings.QDRANT_URL).toBeUndefined();
    expect(settings.OPENAI_API_KEY).toBe('test-secret');
  });

  it('rejects non-positive or non-integer numbers', () => {
    expect(() => loadSettings({ SEARCH_TOP_K: '0' })).toThrow(ConfigurationError);
    expect(() => loadSettings({ RRF_K: '2.5' })).toThrow(ConfigurationError);
    expect(() => loadSettings({ PORT: 'abc' })).toThrow('Invalid configuration: PORT:');
  });

  it('rejects an unknown log level', () => {
    expect(() => loadSettings({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });
});
