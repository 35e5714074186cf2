import winston from 'winston';
// Loads .env before LOG_LEVEL is read below
import './config.js';
import type { Logger } from '../types/index.js';

const baseLogger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'rep-firm-scraper' },
  transports: [new winston.transports.Console()],
});

/**
 * Shared structured logger: a message plus a flat meta object per entry
 */
export const logger: Logger = {
  debug: (message, meta) => baseLogger.debug(message, meta),
  info: (message, meta) => baseLogger.info(message, meta),
  warn: (message, meta) => baseLogger.warn(message, meta),
  error: (message, meta) => baseLogger.error(message, meta),
};

export function setLogLevel(level: string): void {
  baseLogger.level = level;
}
