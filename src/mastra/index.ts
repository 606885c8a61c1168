import 'dotenv/config';
import { Mastra } from '@mastra/core/mastra';
import { LibSQLStore } from '@mastra/libsql';
import { Observability } from '@mastra/observability';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { loadSettings } from './config/settings';
import { createAppLogger } from './config/logger';
import { createSearchServices } from './config/container';
import { createProductSearchWorkflow } from './workflows/product-search-workflow';

const currentFile = fileURLToPath(import.meta.url);
const currentDir = dirname(currentFile);
const dbPath = join(currentDir, '..', '..', 'data', 'mastra.db');

export const settings = loadSettings();
export const logger = createAppLogger(settings.LOG_LEVEL);

// Workflow snapshots: LIBSQL_URL for a remote database, local file otherwise
const libsqlUrl = settings.LIBSQL_URL ?? `file:${dbPath}`;
logger.info(`[Mastra] Using LibSQL URL: ${libsqlUrl.startsWith('file:') ? 'local file' : 'remote'}`);

export const services = createSearchServices(settings, logger);

export const mastra = new Mastra({
  workflows: {
    productSearchWorkflow: createProductSearchWorkflow(services.search),
  },
  storage: new LibSQLStore({
    id: 'main',
    url: libsqlUrl,
    ...(settings.LIBSQL_AUTH_TOKEN ? { authToken: settings.LIBSQL_AUTH_TOKEN } : {}),
  }),
  logger,
  observability: new Observability({
    default: { enabled: true },
  }),
});
