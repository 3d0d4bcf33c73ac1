/**
 * Custom Error Classes for the Perp Liquidity Analyzer
 *
 * Typed errors so per-venue failures can be reported without aborting
 * the whole multi-venue analysis.
 */

import type { FetchFailureKind } from './types.js';

/**
 * Base class for all liquidity engine errors
 */
export class LiquidityEngineError extends Error {
  public readonly code: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'LiquidityEngineError';
    this.code = code;
    this.timestamp = new Date();
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

// ============================================================================
// MARKET DATA ERRORS
// ============================================================================

export class MarketDataError extends LiquidityEngineError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'MarketDataError';
  }
}

export class MalformedOrderBookError extends MarketDataError {
  public readonly venue: string;
  public readonly instrument: string;

  constructor(venue: string, instrument: string, reason: string) {
    super(
      `Malformed order book for ${instrument} on ${venue}: ${reason}`,
      'MALFORMED_ORDER_BOOK',
      { venue, instrument, reason }
    );
    this.name = 'MalformedOrderBookError';
    this.venue = venue;
    this.instrument = instrument;
  }
}

export class UnknownVenueError extends MarketDataError {
  constructor(venue: string) {
    super(`Unknown venue: ${venue}`, 'UNKNOWN_VENUE', { venue });
    this.name = 'UnknownVenueError';
  }
}

export class FetchFailureError extends MarketDataError {
  public readonly venue: string;
  public readonly kind: FetchFailureKind;
  public readonly status?: number;

  constructor(
    venue: string,
    kind: FetchFailureKind,
    reason: string,
    context?: Record<string, unknown> & { status?: number }
  ) {
    super(`Fetch failed for ${venue} (${kind}): ${reason}`, 'FETCH_FAILURE', {
      venue,
      kind,
      reason,
      ...context,
    });
    this.name = 'FetchFailureError';
    this.venue = venue;
    this.kind = kind;
    this.status = context?.status;
  }
}

// ============================================================================
// ANALYSIS ERRORS
// ============================================================================

export class AnalysisError extends LiquidityEngineError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'AnalysisError';
  }
}

export class NoLiquidityError extends AnalysisError {
  constructor(venue: string, instrument: string, side: 'bids' | 'asks') {
    super(`No liquidity for ${instrument} on ${venue}: ${side} empty`, 'NO_LIQUIDITY', {
      venue,
      instrument,
      side,
    });
    this.name = 'NoLiquidityError';
  }
}

export class InvalidNotionalError extends AnalysisError {
  constructor(value: string) {
    super(`Invalid notional size: ${value}`, 'INVALID_NOTIONAL', { value });
    this.name = 'InvalidNotionalError';
  }
}

export class InvalidInstrumentError extends AnalysisError {
  constructor(instrument: string, reason: string) {
    super(`Invalid instrument ${instrument}: ${reason}`, 'INVALID_INSTRUMENT', {
      instrument,
      reason,
    });
    this.name = 'InvalidInstrumentError';
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends LiquidityEngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

export class InvalidConfigError extends ConfigurationError {
  constructor(key: string, value: unknown, reason: string) {
    super(`Invalid configuration for ${key}: ${reason}`, { key, value, reason });
    this.name = 'InvalidConfigError';
  }
}

// ============================================================================
// API ERRORS
// ============================================================================

export class ApiError extends LiquidityEngineError {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number, context?: Record<string, unknown>) {
    super(message, 'API_ERROR', context);
    this.name = 'ApiError';
    this.statusCode = statusCode;
  }
}

// ============================================================================
// ERROR UTILITY FUNCTIONS
// ============================================================================

/**
 * Check if an error is a liquidity engine error
 */
export function isLiquidityEngineError(error: unknown): error is LiquidityEngineError {
  return error instanceof LiquidityEngineError;
}

/**
 * Wrap unknown errors in LiquidityEngineError
 */
export function wrapError(error: unknown, defaultMessage = 'Unknown error'): LiquidityEngineError {
  if (isLiquidityEngineError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new LiquidityEngineError(error.message, 'WRAPPED_ERROR', {
      originalName: error.name,
      originalStack: error.stack,
    });
  }

  return new LiquidityEngineError(defaultMessage, 'UNKNOWN_ERROR', {
    originalError: String(error),
  });
}
