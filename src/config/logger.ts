import pino, { type LoggerOptions } from 'pino';

import type { AppConfig } from './schema.js';

export function createLogger(config: Pick<AppConfig, 'LOG_LEVEL'>) {
  const options: LoggerOptions = {
    level: config.LOG_LEVEL,
    base: {
      service: 'paper-trader'
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  return pino(options);
}
