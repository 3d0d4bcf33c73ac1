/**
 * Perp Liquidity Analyzer - Library Entry Point
 *
 * Fetches L2 order books from several perpetuals venues, simulates market
 * orders at fixed USD clip sizes and ranks venues by total execution cost
 * (slippage plus taker fee).
 */

// Configuration
export { loadConfig, getConfig, resetConfig, parseConfig, systemConfigSchema } from './config/index.js';

// Market Data
export {
  normalize,
  fetchAllBooks,
  fetchVenueBook,
  createHttpClient,
  classifyHttpError,
  VENUE_ADAPTERS,
  getVenueAdapter,
} from './market-data/index.js';
export type {
  BookResult,
  FetchOptions,
  JsonHttpClient,
  Normalizer,
  VenueAdapter,
  VenueFetchRequest,
} from './market-data/index.js';

// Execution
export { simulateFill, getBookTop, getSideDepthNotional } from './execution/index.js';

// Analysis
export {
  analyzeVenue,
  lookupTakerFee,
  rankBySize,
  formatCostBreakdown,
  renderRankingsText,
  formatClipSize,
  analyzeLiquidity,
  toRankingRecords,
  toDetailedRecords,
  toVenueRecords,
  toRpiRecords,
  toFeeRecords,
  toReportRecord,
} from './analysis/index.js';
export type { AnalyzeOptions, ReportRecord } from './analysis/index.js';

// API
export { createApiServer, startApiServer } from './api/server.js';

// Events
export { eventBus, withEventHandler, enableEventLogging } from './core/events.js';

// Errors
export * from './core/errors.js';

// Constants and types
export { VENUES, CLIP_SIZES, DEFAULT_TAKER_FEES } from './core/constants.js';
export type * from './core/types.js';
