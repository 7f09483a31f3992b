import { env } from 'node:process';

import pino, { type Logger, type LoggerOptions } from 'pino';

export const loggerConfig: LoggerOptions = {
  level: env.LOG_LEVEL || 'info',
  base: {
    service: env.SERVICE_NAME || 'influencer-marketplace',
  },
};

export type { Logger };

export const logger = pino(loggerConfig);
