import { describe, it, expect, vi } from 'vitest';
import { OpenAIQueryAnalyzer, parseQueryAnalysis } from '../openai-query-analyzer';
import { ConfigurationError, QueryAnalysisError } from '../../utils/errors';
import type { SearchLogger } from '../../../types/hybrid-search.types';

describe('parseQueryAnalysis', () => {
  it('parses the cleaned query and tagged filters', () => {
    const content = JSON.stringify({
      search_query: 'oak chair',
      filters: { base_price: { lte: 500 }, categories: ['Guest Seating'] },
    });

    expect(parseQueryAnalysis(content, 'oak guest chair under 500')).toEqual({
      search_query: 'oak chair',
      filters: {
        base_price: { kind: 'range', lte: 500 },
        categories: { kind: 'any', values: ['Guest Seating'] },
      },
      dropped: [],
    });
  });

  it('extracts a JSON object surrounded by prose', () => {
    const result = parseQueryAnalysis('Here you go: {"search_query": "desk"} done', 'a desk');

    expect(result).toEqual({ search_query: 'desk', filters: {}, dropped: [] });
  });

  it('falls back to the user query when the cleaned query is blank or missing', () => {
    expect(parseQueryAnalysis('{"search_query": "   "}', 'lounge chair').search_query).toBe('lounge chair');
    expect(parseQueryAnalysis('{"filters": {}}', 'stool').search_query).toBe('stool');
  });

  it('reports filter values it cannot use', () => {
    const result = parseQueryAnalysis('{"search_query": "chair", "filters": {"base_price": {"lte": "cheap"}}}', 'chair');

    expect(result.filters).toEqual({});
    expect(result.dropped).toEqual(['base_price']);
  });

  it('throws when there is no JSON object', () => {
    expect(() => parseQueryAnalysis('no json here', 'chair')).toThrow(QueryAnalysisError);
  });

  it('throws on an unexpected shape', () => {
    expect(() => parseQueryAnalysis('{"search_query": 5}', 'chair')).toThrow(QueryAnalysisError);
    expect(() => parseQueryAnalysis('[1, 2]', 'chair')).toThrow(QueryAnalysisError);
  });
});

describe('OpenAIQueryAnalyzer', () => {
  it('refuses to run without an API key', async () => {
    const logger: SearchLogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const analyzer = new OpenAIQueryAnalyzer({ logger });

    await expect(analyzer.analyze('chair')).rejects.toThrow(ConfigurationError);
  });
});
