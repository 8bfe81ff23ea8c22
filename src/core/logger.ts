import pino from 'pino';

export type { Logger } from 'pino';

export const logger = pino({
  level: process.env['LOG_LEVEL'] || 'info',
  base: {
    service: 'inventory',
    release: process.env['SERVICE_VERSION'] || '0.0.0',
  },
  serializers: {
    error: pino.stdSerializers.err,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
});
