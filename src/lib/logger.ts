import pino from 'pino';

/**
 * Structured logging with Pino
 * - JSON output
 * - No transports (safe inside route handlers and scripts alike)
 */

const isDev = process.env.NODE_ENV === 'development';

export const logger = pino({
  level: process.env.LOG_LEVEL || (isDev ? 'debug' : 'info'),
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'contact-email-finder',
  },
});

export const log = {
  api: (endpoint: string, data: Record<string, unknown>) =>
    logger.info({ endpoint, ...data }, `API: ${endpoint}`),

  batch: (action: string, data: Record<string, unknown>) =>
    logger.info({ action, ...data }, `Batch: ${action}`),
};

export default logger;
