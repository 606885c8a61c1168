import { embed } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import type { Embedder, SearchLogger } from '../../types/hybrid-search.types';
import { MODELS } from '../config/models';
import { ConfigurationError, EmbeddingError, errorMessage } from '../utils/errors';
import { createConsoleLogger } from '../utils/logger';

export interface OpenAIEmbedderOptions {
  apiKey?: string;
  model?: string;
  logger?: SearchLogger;
}

export class OpenAIEmbedder implements Embedder {
  private readonly provider: ReturnType<typeof createOpenAI> | null;
  private readonly model: string;
  private readonly logger: SearchLogger;

  constructor(options: OpenAIEmbedderOptions) {
    this.provider = options.apiKey ? createOpenAI({ apiKey: options.apiKey }) : null;
    this.model = options.model ?? MODELS.EMBEDDINGS;
    this.logger = options.logger ?? createConsoleLogger('Embedder');
  }

  async embed(text: string): Promise<number[]> {
    if (!this.provider) {
      throw new ConfigurationError('OPENAI_API_KEY is not configured');
    }

    let embedding: number[];
    try {
      ({ embedding } = await embed({
        model: this.provider.embedding(this.model),
        value: text,
      }));
    } catch (error) {
      throw new EmbeddingError(`Failed to generate embedding: ${errorMessage(error)}`, { cause: error });
    }

    if (!embedding || embedding.length === 0) {
      throw new EmbeddingError('Failed to generate embedding: empty vector returned');
    }

    this.logger.debug(`Generated embedding for "${text.substring(0, 50)}" (${embedding.length} dimensions)`);
    return embedding;
  }
}
