/**
 * Logging Configuration for the Perp Liquidity Analyzer
 *
 * Uses Winston for structured logging. Console output goes to stderr so
 * CLI output on stdout (tables, --json) stays clean.
 */

import winston from 'winston';
import { LOGGING } from '../core/constants.js';
import type { LiquidityEngineError } from '../core/errors.js';

// ============================================================================
// LOG FORMATS
// ============================================================================

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}] ${String(message)}${metaStr}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.json()
);

// ============================================================================
// LOGGER INSTANCE
// ============================================================================

export const logger = winston.createLogger({
  level: process.env['LOG_LEVEL'] ?? LOGGING.DEFAULT_LEVEL,
  defaultMeta: { service: 'perp-liquidity-analyzer' },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
  ],
});

// Add file transports in non-test environments
if (process.env['NODE_ENV'] !== 'test') {
  logger.add(
    new winston.transports.File({
      filename: `${LOGGING.LOG_DIR}error.log`,
      level: 'error',
      format: fileFormat,
      maxsize: LOGGING.FILE_MAX_SIZE,
      maxFiles: LOGGING.FILE_MAX_FILES,
    })
  );

  logger.add(
    new winston.transports.File({
      filename: `${LOGGING.LOG_DIR}combined.log`,
      format: fileFormat,
      maxsize: LOGGING.FILE_MAX_SIZE,
      maxFiles: LOGGING.FILE_MAX_FILES,
    })
  );
}

// ============================================================================
// SPECIALIZED LOGGERS
// ============================================================================

/**
 * Market data logger - for venue fetches and normalization
 */
export const marketDataLogger = logger.child({ component: 'market-data' });

/**
 * Analysis logger - for slippage simulation and ranking
 */
export const analysisLogger = logger.child({ component: 'analysis' });

/**
 * API logger - for the HTTP API
 */
export const apiLogger = logger.child({ component: 'api' });

// ============================================================================
// LOGGING UTILITIES
// ============================================================================

/**
 * Log a liquidity engine error with full context
 */
export function logError(error: LiquidityEngineError): void {
  logger.error(error.message, {
    code: error.code,
    context: error.context,
    stack: error.stack,
  });
}

/**
 * Log the outcome of one venue fetch
 */
export function logVenueFetch(
  outcome: 'FETCHED' | 'FAILED',
  venue: string,
  details: Record<string, unknown>
): void {
  const level = outcome === 'FAILED' ? 'warn' : 'debug';
  marketDataLogger.log(level, `Order book ${outcome}`, { venue, ...details });
}

/**
 * Create a performance timer. Returns elapsed milliseconds when stopped.
 */
export function createTimer(operation: string): () => number {
  const start = performance.now();
  return () => {
    const duration = performance.now() - start;
    logger.debug(`${operation} completed`, { durationMs: duration.toFixed(2) });
    return duration;
  };
}

// ============================================================================
// LOG LEVEL CONTROL
// ============================================================================

/**
 * Set log level at runtime
 */
export function setLogLevel(level: string): void {
  logger.level = level;
  logger.debug(`Log level set to ${level}`);
}
