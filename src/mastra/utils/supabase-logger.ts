/**
 * Supabase Query Logger
 *
 * Wraps Supabase queries with structured logging: name, table, filters,
 * row count and duration, plus the failure message when the query errors.
 */

import type { SearchLogger } from '../../types/hybrid-search.types';
import { createConsoleLogger } from './logger';

export interface SupabaseResult<T> {
  data: T | null;
  error: { message: string } | null;
  count?: number | null;
}

const supabaseConsoleLogger = createConsoleLogger('Supabase');

export async function executeWithLogging<T>(
  queryName: string,
  table: string,
  filters: Record<string, unknown>,
  queryFn: () => PromiseLike<SupabaseResult<T>>,
  logger: SearchLogger = supabaseConsoleLogger,
): Promise<SupabaseResult<T>> {
  const startTime = Date.now();

  logger.info(`[Supabase] Executing: ${queryName} on ${table}`, Object.keys(filters).length > 0 ? { filters } : undefined);

  const result = await queryFn();
  const duration = Date.now() - startTime;

  if (result.error) {
    logger.error(`[Supabase] FAILED: ${queryName} - ${result.error.message} (${duration}ms)`);
    return result;
  }

  const rowCount = Array.isArray(result.data) ? result.data.length : result.data ? 1 : 0;
  logger.info(`[Supabase] OK: ${queryName} | ${rowCount} rows | ${duration}ms`);

  return result;
}
