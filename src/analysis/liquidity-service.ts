/**
 * Liquidity Service
 *
 * One analysis request end to end: fetch every venue's book concurrently,
 * analyze each one that arrived, then rank venues per clip size.
 */

import { v4 as uuidv4 } from 'uuid';
import { INSTRUMENT_PATTERN } from '../core/constants.js';
import { InvalidInstrumentError, InvalidNotionalError } from '../core/errors.js';
import { eventBus } from '../core/events.js';
import { loadConfig } from '../config/index.js';
import { fetchAllBooks, type FetchOptions } from '../market-data/orchestrator.js';
import { analysisLogger, createTimer } from '../utils/logger.js';
import { analyzeVenue, lookupTakerFee } from './venue-analyzer.js';
import { rankBySize } from './ranking.js';
import type {
  LiquidityReport,
  SystemConfig,
  TakerFeeTable,
  VenueAnalysis,
  VenueName,
  VenueReport,
} from '../core/types.js';

export interface AnalyzeOptions {
  venues?: VenueName[];
  clipSizes?: number[];
  timeoutMs?: number;
  takerFees?: TakerFeeTable;
  /** Defaults to loadConfig() */
  config?: SystemConfig;
  /** Adapter, base URL and HTTP client overrides for the fetch stage */
  fetch?: Omit<FetchOptions, 'timeoutMs'>;
}

export type AnalyzeLiquidity = (instrument: string, options?: AnalyzeOptions) => Promise<LiquidityReport>;

/**
 * Upper-case and validate an instrument symbol
 */
export function normalizeInstrument(instrument: string): string {
  const symbol = instrument.trim().toUpperCase();
  if (!INSTRUMENT_PATTERN.test(symbol)) {
    throw new InvalidInstrumentError(instrument, 'expected 1-20 letters or digits');
  }
  return symbol;
}

export async function analyzeLiquidity(instrument: string, options: AnalyzeOptions = {}): Promise<LiquidityReport> {
  const symbol = normalizeInstrument(instrument);
  const config = options.config ?? loadConfig();

  const venues = [...new Set(options.venues ?? config.fetch.venues)].sort();
  const clipSizes = [...new Set(options.clipSizes ?? config.analysis.clipSizes)].sort((a, b) => a - b);
  const takerFees = options.takerFees ?? config.fees.takerFeesBps;

  for (const size of clipSizes) {
    if (!Number.isFinite(size) || size <= 0) {
      throw new InvalidNotionalError(String(size));
    }
  }

  const requestId = uuidv4();
  const stopTimer = createTimer(`analysis ${symbol}`);
  eventBus.emit('ANALYSIS_STARTED', { requestId, instrument: symbol, venues });
  analysisLogger.info('Analysis started', { requestId, instrument: symbol, venues, clipSizes });

  const books = await fetchAllBooks(symbol, venues, {
    baseUrls: config.fetch.baseUrls,
    ...options.fetch,
    timeoutMs: options.timeoutMs ?? config.fetch.timeoutMs,
  });

  const reports: VenueReport[] = [];
  const analyses: VenueAnalysis[] = [];

  for (const venue of venues) {
    const result = books.get(venue);
    if (!result) continue;

    if (!result.ok) {
      reports.push({ exchange: venue, status: 'error', code: result.error.code, error: result.error.message });
      continue;
    }

    const outcome = analyzeVenue(result.value, clipSizes, lookupTakerFee(takerFees, venue));
    if (!outcome.ok) {
      reports.push({ exchange: venue, status: 'error', code: outcome.error.code, error: outcome.error.message });
      continue;
    }

    const analysis = outcome.value;
    analyses.push(analysis);
    reports.push({ exchange: venue, status: 'ok', analysis });
    eventBus.emit('VENUE_ANALYZED', { requestId, analysis });
  }

  const succeeded = reports.filter(r => r.status === 'ok').map(r => r.exchange);
  const failed = reports.filter(r => r.status === 'error').map(r => r.exchange);
  const durationMs = Math.round(stopTimer());

  eventBus.emit('ANALYSIS_COMPLETED', { requestId, instrument: symbol, succeeded, failed, durationMs });
  analysisLogger.info('Analysis completed', { requestId, instrument: symbol, succeeded, failed, durationMs });

  return {
    id: requestId,
    instrument: symbol,
    generatedAt: new Date(),
    clipSizes,
    venues: reports,
    rankings: rankBySize(analyses),
  };
}
