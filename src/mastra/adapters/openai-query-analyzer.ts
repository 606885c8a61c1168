import OpenAI from 'openai';
import { z } from 'zod';
import type { QueryAnalysis, QueryAnalyzer, SearchLogger } from '../../types/hybrid-search.types';
import { parseFilterSet } from '../../schemas/filter.schema';
import { MODELS, MODEL_CONFIGS } from '../config/models';
import { ConfigurationError, QueryAnalysisError, errorMessage } from '../utils/errors';
import { createConsoleLogger } from '../utils/logger';

export const PRODUCT_CATEGORIES = [
  'Benches and Ottomans',
  'Cafe and Cafeteria Seating',
  'Classroom Seating',
  'Conference and Management Seating',
  'Dining Cafeteria',
  'Education',
  'Guest Seating',
  'Healthcare',
  'Heavy Duty and 24HR Office Seating',
  'Lounge Seating',
  'Mesh Seating',
  'Pedestal Seating',
  'Stacking and Nesting Chairs',
  'Stools',
  'Tandem Seating',
  'Wood Frame Seating',
  'Work and Task Seating',
  'Workplace',
] as const;

const SYSTEM_PROMPT = `
You turn natural language furniture searches into a semantic search phrase plus metadata filters.

Each product in the catalog carries this metadata:
{
  "product_code": "1004",
  "base_price": 1325.0,
  "categories": ["Wood Frame Seating", "Guest Seating"],
  "series": "Chap",
  "height_value": 30.0, "width_value": 24.5, "depth_value": 22.5,
  "weight_value": 26.0, "volume_value": 13.25
}

Filterable fields:
- product_code (string)
- base_price (number, USD)
- categories (list, use only these names): ${PRODUCT_CATEGORIES.join(', ')}
- height_value, width_value, depth_value (inches), weight_value (lbs), volume_value (number)

Filter values:
- numbers: {"gte": X}, {"lte": X}, {"gt": X}, {"lt": X} or a combination such as {"gte": X, "lte": Y}
- categories: always a list, even for a single category
- product_code: a plain string

Rules:
- "under/below/less than" means lte, "over/above/more than" means gte, "between X and Y" means both.
- Map synonyms to the official category names ("conference" is "Conference and Management Seating", "24hr" is "Heavy Duty and 24HR Office Seating").
- Remove category and price wording from search_query; keep product type, material, style and series names there.
- Series names stay in search_query and never become filters.
- When nothing can be filtered, return an empty filters object.

Answer ONLY with a JSON object:
{"search_query": "chair", "filters": {"categories": ["Workplace"], "base_price": {"lte": 500}}}
`.trim();

const analyzerOutputSchema = z.object({
  search_query: z.string().optional(),
  filters: z.unknown().optional(),
});

/**
 * Validates a raw analyzer answer. The cleaned query falls back to the user
 * query when missing or blank; filter values that do not fit the tagged
 * filter type are dropped.
 */
export const parseQueryAnalysis = (content: string, userQuery: string): QueryAnalysis & { dropped: string[] } => {
  let parsed: unknown;

  try {
    parsed = JSON.parse(content);
  } catch {
    const match = content.match(/\{[\s\S]*\}/);
    if (!match) {
      throw new QueryAnalysisError('Query analyzer returned no JSON object');
    }
    try {
      parsed = JSON.parse(match[0]);
    } catch (error) {
      throw new QueryAnalysisError('Query analyzer returned malformed JSON', { cause: error });
    }
  }

  const result = analyzerOutputSchema.safeParse(parsed);
  if (!result.success) {
    throw new QueryAnalysisError(`Query analyzer returned an unexpected shape: ${result.error.message}`);
  }

  const searchQuery = result.data.search_query?.trim();
  const { filters, dropped } = parseFilterSet(result.data.filters);

  return {
    search_query: searchQuery && searchQuery.length > 0 ? searchQuery : userQuery,
    filters,
    dropped,
  };
};

export interface OpenAIQueryAnalyzerOptions {
  apiKey?: string;
  model?: string;
  logger?: SearchLogger;
}

export class OpenAIQueryAnalyzer implements QueryAnalyzer {
  private readonly client: OpenAI | null;
  private readonly model: string;
  private readonly logger: SearchLogger;

  constructor(options: OpenAIQueryAnalyzerOptions) {
    this.client = options.apiKey ? new OpenAI({ apiKey: options.apiKey }) : null;
    this.model = options.model ?? MODELS.QUERY_ANALYZER;
    this.logger = options.logger ?? createConsoleLogger('QueryAnalyzer');
  }

  async analyze(text: string): Promise<QueryAnalysis> {
    if (!this.client) {
      throw new ConfigurationError('OPENAI_API_KEY is not configured');
    }

    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: text },
        ],
        temperature: MODEL_CONFIGS.QUERY_ANALYSIS.temperature,
        max_tokens: MODEL_CONFIGS.QUERY_ANALYSIS.maxTokens,
        response_format: { type: 'json_object' },
      });
      content = completion.choices[0]?.message?.content?.trim();
    } catch (error) {
      throw new QueryAnalysisError(`Query analysis request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!content) {
      throw new QueryAnalysisError('Query analyzer returned an empty answer');
    }

    const { search_query, filters, dropped } = parseQueryAnalysis(content, text);

    if (dropped.length > 0) {
      this.logger.warn('Dropped unusable filters from query analysis', { fields: dropped });
    }
    this.logger.info('Query analysis result', { search_query, filters });

    return { search_query, filters };
  }
}
