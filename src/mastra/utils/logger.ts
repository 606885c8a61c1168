import type { SearchLogger } from '../../types/hybrid-search.types';

const formatArgs = (args?: Record<string, unknown>) =>
  args && Object.keys(args).length > 0 ? ` ${JSON.stringify(args)}` : '';

/**
 * Console logger for code paths that run without the Mastra logger
 * (scripts, tests, ad-hoc wiring).
 */
export const createConsoleLogger = (prefix: string): SearchLogger => ({
  debug: (message, args) => {
    if (process.env.DEBUG === 'true') {
      console.log(`\x1b[90m[${prefix} DEBUG]\x1b[0m ${message}${formatArgs(args)}`);
    }
  },
  info: (message, args) => {
    console.log(`\x1b[36m[${prefix}]\x1b[0m ${message}${formatArgs(args)}`);
  },
  warn: (message, args) => {
    console.warn(`\x1b[33m[${prefix} WARN]\x1b[0m ${message}${formatArgs(args)}`);
  },
  error: (message, args) => {
    console.error(`\x1b[31m[${prefix} ERROR]\x1b[0m ${message}${formatArgs(args)}`);
  },
});
