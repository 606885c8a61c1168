import express from 'express';
import type { Response } from 'express';
import type { ZodError } from 'zod';
import { mastra, services, settings, logger } from './mastra/index';
import { embeddingRequestSchema, previewQuerySchema, searchInputSchema } from './schemas/input.schema';
import { errorMessage } from './mastra/utils/errors';

logger.info('[Server] Mastra loaded successfully');

const sendValidationError = (res: Response, error: ZodError) =>
  res.status(400).json({
    error: 'Invalid request',
    issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });

const sendServerError = (res: Response, route: string, error: unknown) => {
  logger.error(`Error in ${route}`, { error: errorMessage(error) });
  return res.status(500).json({
    error: 'Internal server error',
    details: errorMessage(error),
  });
};

const app = express();

app.use(express.json());

// Health check endpoint
app.get('/health', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

app.get('/', (_req, res) => {
  res.json({
    service: 'Product Hybrid Search API',
    version: '1.0.0',
    endpoints: {
      search: 'POST /api/search',
      search_health: 'GET /api/search/health',
      create_embeddings: 'POST /api/embeddings/create',
      preview: 'GET /api/embeddings/preview',
      stats: 'GET /api/embeddings/stats',
      clear: 'DELETE /api/embeddings/clear',
      health: 'GET /health',
    },
  });
});

app.post('/api/search', async (req, res) => {
  const input = searchInputSchema.safeParse(req.body ?? {});
  if (!input.success) {
    return sendValidationError(res, input.error);
  }

  try {
    const workflow = mastra.getWorkflow('productSearchWorkflow');
    const run = await workflow.createRun();
    const result = await run.start({ inputData: input.data });

    if (result.status !== 'success') {
      const details = result.status === 'failed' ? errorMessage(result.error) : `Workflow ended with status ${result.status}`;
      logger.error('[Server] Search workflow failed', { run_id: run.runId, status: result.status, details });
      return res.status(500).json({ error: 'Internal server error', details });
    }

    return res.json(result.result);
  } catch (err) {
    return sendServerError(res, '/api/search', err);
  }
});

app.get('/api/search/health', async (_req, res) => {
  res.json(await services.search.health());
});

app.post('/api/embeddings/create', async (req, res) => {
  const input = embeddingRequestSchema.safeParse(req.body ?? {});
  if (!input.success) {
    return sendValidationError(res, input.error);
  }

  try {
    const report = await services.embeddings.ingestProducts(input.data.skip, input.data.limit);
    const stats = await services.embeddings.stats();
    return res.json({
      message: 'Embedding creation completed',
      results: report,
      stats,
    });
  } catch (err) {
    return sendServerError(res, '/api/embeddings/create', err);
  }
});

app.get('/api/embeddings/preview', async (req, res) => {
  const query = previewQuerySchema.safeParse(req.query);
  if (!query.success) {
    return sendValidationError(res, query.error);
  }

  try {
    const previews = await services.embeddings.preview(query.data.limit);
    return res.json({ previews, total: previews.length });
  } catch (err) {
    return sendServerError(res, '/api/embeddings/preview', err);
  }
});

app.get('/api/embeddings/stats', async (_req, res) => {
  try {
    return res.json(await services.embeddings.stats());
  } catch (err) {
    return sendServerError(res, '/api/embeddings/stats', err);
  }
});

app.delete('/api/embeddings/clear', async (_req, res) => {
  try {
    const deleted = await services.embeddings.clear();
    return res.json({ message: `Cleared ${deleted} embeddings`, deleted_count: deleted });
  } catch (err) {
    return sendServerError(res, '/api/embeddings/clear', err);
  }
});

const host = '0.0.0.0';
app.listen(settings.PORT, host, () => {
  logger.info(`Product search server running at http://${host}:${settings.PORT}`);
});
