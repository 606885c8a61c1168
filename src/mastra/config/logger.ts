import { PinoLogger } from '@mastra/loggers';
import type { Settings } from './settings';

export const createAppLogger = (level: Settings['LOG_LEVEL']): PinoLogger =>
  new PinoLogger({
    name: 'ProductSearch',
    level,
  });
