/**
 * Structured Logger
 *
 * Pino-based structured JSON logging.
 * - Development: pretty-printed, colorized (pino-pretty)
 * - Production: JSON lines
 * - Test: silent unless LOG_LEVEL is set
 *
 * Child loggers for subsystems:
 *   const log = logger.child({ module: 'escrow-sweeper' });
 *   log.info({ offerId }, 'Cancelling stale offer');
 */

import pino from 'pino';
import { config } from './config';

const isDev = config.app.isDevelopment;

function defaultLevel(): string {
  if (config.app.logLevel) return config.app.logLevel;
  if (config.app.isTest) return 'silent';
  return isDev ? 'debug' : 'info';
}

export const logger = pino({
  level: defaultLevel(),

  redact: {
    paths: ['password', 'token', 'secret', 'connectionString', 'database.url'],
    censor: '[REDACTED]',
  },

  base: {
    service: 'trading-core',
    env: config.app.env,
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service,env',
        },
      }
    : undefined,
});

export const ledgerLogger = logger.child({ module: 'ledger' });
export const accountLogger = logger.child({ module: 'account' });
export const orderLogger = logger.child({ module: 'order' });
export const offerLogger = logger.child({ module: 'offer' });
export const bonusLogger = logger.child({ module: 'bonus' });
export const portfolioLogger = logger.child({ module: 'portfolio' });
export const auditLogger = logger.child({ module: 'audit' });
export const dbLogger = logger.child({ module: 'db' });
