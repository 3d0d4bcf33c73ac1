/**
 * HTTP API for the Perp Liquidity Analyzer
 *
 * Read-only JSON endpoints over the liquidity service, with simple
 * in-memory per-IP rate limiting.
 */

import express, { Request, Response, NextFunction } from 'express';
import type { Server } from 'http';
import { loadConfig } from '../config/index.js';
import { ApiError, InvalidInstrumentError, isLiquidityEngineError } from '../core/errors.js';
import { logger, apiLogger, logError } from '../utils/logger.js';
import { analyzeLiquidity, type AnalyzeLiquidity } from '../analysis/liquidity-service.js';
import { toFeeRecords, toReportRecord } from '../analysis/tables.js';
import type { ApiResponse, SystemConfig } from '../core/types.js';

export interface ApiServerDeps {
  analyze: AnalyzeLiquidity;
  config: SystemConfig;
}

// ============================================================================
// SERVER SETUP
// ============================================================================

export function createApiServer({ analyze, config }: ApiServerDeps): express.Express {
  const app = express();

  app.use(express.json());

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    apiLogger.debug(`${req.method} ${req.path}`, { ip: req.ip });
    next();
  });

  // Rate limiting (simple in-memory)
  const requestCounts = new Map<string, { count: number; resetTime: number }>();

  app.use((req: Request, res: Response, next: NextFunction) => {
    const ip = req.ip ?? 'unknown';
    const now = Date.now();
    const window = requestCounts.get(ip);

    if (!window || now > window.resetTime) {
      requestCounts.set(ip, {
        count: 1,
        resetTime: now + config.api.rateLimitWindowMs,
      });
      return next();
    }

    window.count++;

    if (window.count > config.api.rateLimitMaxRequests) {
      apiLogger.warn('Rate limit exceeded', { ip });
      return res.status(429).json(failure('Rate limit exceeded'));
    }

    next();
  });

  // ==========================================================================
  // ROUTES
  // ==========================================================================

  app.get('/health', (_req: Request, res: Response) => {
    res.json(success({ status: 'ok', uptime: process.uptime() }));
  });

  app.get('/api/fees', (_req: Request, res: Response) => {
    res.json(success(toFeeRecords(config.fees.takerFeesBps)));
  });

  app.get('/api/instruments', (_req: Request, res: Response) => {
    res.json(
      success({
        instruments: config.analysis.instruments,
        defaultInstrument: config.analysis.defaultInstrument,
      })
    );
  });

  app.get('/api/liquidity/:instrument', async (req: Request, res: Response) => {
    const instrument = (req.params['instrument'] ?? '').toUpperCase();

    try {
      if (!config.analysis.instruments.includes(instrument)) {
        throw new ApiError(`Unsupported instrument: ${instrument}`, 400, { instrument });
      }
      const report = await analyze(instrument, { config });
      res.json(success(toReportRecord(report)));
    } catch (error) {
      const apiError = toApiError(error);
      if (apiError.statusCode >= 500) {
        logError(isLiquidityEngineError(error) ? error : apiError);
      }
      res.status(apiError.statusCode).json(failure(apiError.message));
    }
  });

  return app;
}

// ============================================================================
// RESPONSES
// ============================================================================

function success<T>(data: T): ApiResponse<T> {
  return { success: true, data, timestamp: new Date() };
}

function failure(error: string): ApiResponse<never> {
  return { success: false, error, timestamp: new Date() };
}

/**
 * Client errors keep their message; anything else is a generic 500
 */
function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) return error;
  if (error instanceof InvalidInstrumentError) {
    return new ApiError(error.message, 400, error.context);
  }
  return new ApiError('Liquidity analysis failed', 500, { cause: String(error) });
}

// ============================================================================
// SERVER START
// ============================================================================

export interface StartApiServerOptions {
  config?: SystemConfig;
  analyze?: AnalyzeLiquidity;
  port?: number;
}

export function startApiServer(options: StartApiServerOptions = {}): Server {
  const config = options.config ?? loadConfig();
  const port = options.port ?? config.api.port;
  const app = createApiServer({ analyze: options.analyze ?? analyzeLiquidity, config });

  return app.listen(port, () => {
    logger.info(`API server listening on port ${port}`);
  });
}
