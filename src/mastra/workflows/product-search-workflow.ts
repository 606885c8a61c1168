import { createStep, createWorkflow } from '@mastra/core/workflows';
import { searchInputSchema, searchResponseSchema } from '../../schemas/input.schema';
import type { HybridSearchService } from '../services/hybrid-search-service';

export const createProductSearchWorkflow = (searchService: HybridSearchService) => {
  const hybrid_search_step = createStep({
    id: 'hybrid_search',
    description: 'Analyzes the query, retrieves semantic and keyword candidates, fuses and enriches them',
    inputSchema: searchInputSchema,
    outputSchema: searchResponseSchema,
    execute: async ({ inputData }) => searchService.search(inputData.query, inputData.mode),
  });

  const productSearchWorkflow = createWorkflow({
    id: 'product-search-workflow',
    inputSchema: searchInputSchema,
    outputSchema: searchResponseSchema,
  }).then(hybrid_search_step);

  productSearchWorkflow.commit();

  return productSearchWorkflow;
};
