import { describe, it, expect, vi } from 'vitest';
import { createSearchServices } from '../container';
import { loadSettings } from '../settings';
import { MemoryVectorStore } from '../../adapters/memory-vector-store';
import { QdrantVectorStore } from '../../adapters/qdrant-vector-store';
import { ConfigurationError } from '../../utils/errors';
import type { SearchLogger } from '../../../types/hybrid-search.types';

const silentLogger = (): SearchLogger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe('createSearchServices', () => {
  it('uses the in-process vector store without a Qdrant URL', () => {
    const logger = silentLogger();
    const services = createSearchServices(loadSettings({ QDRANT_COLLECTION_NAME: 'catalog' }), logger);

    expect(services.vectorStore).toBeInstanceOf(MemoryVectorStore);
    expect(services.vectorStore.collectionName).toBe('catalog');
    expect(logger.warn).toHaveBeenCalledWith('QDRANT_URL is not set, using the in-process vector store');
  });

  it('uses Qdrant when a URL is configured', () => {
    const services = createSearchServices(loadSettings({ QDRANT_URL: 'http://localhost:6333' }), silentLogger());

    expect(services.vectorStore).toBeInstanceOf(QdrantVectorStore);
    expect(services.vectorStore.collectionName).toBe('products');
  });

  it('resets the keyword index when the corpus is cleared', async () => {
    const services = createSearchServices(loadSettings({}), silentLogger());
    const reset = vi.spyOn(services.search, 'resetKeywordIndex');

    await services.embeddings.clear();

    expect(reset).toHaveBeenCalledTimes(1);
  });

  it('fails a search without OpenAI credentials', async () => {
    const services = createSearchServices(loadSettings({}), silentLogger());

    await expect(services.search.search('chair')).rejects.toThrow(ConfigurationError);
  });
});
