/**
 * Analysis Module
 */

export { analyzeVenue, lookupTakerFee } from './venue-analyzer.js';
export type { VenueAnalysisResult } from './venue-analyzer.js';
export { rankBySize, formatCostBreakdown, renderRankingsText, formatClipSize } from './ranking.js';
export { toRankingRecords, toDetailedRecords, toVenueRecords, toRpiRecords, toFeeRecords, toReportRecord } from './tables.js';
export type { ReportRecord, RankingTableRecord } from './tables.js';
export { analyzeLiquidity, normalizeInstrument } from './liquidity-service.js';
export type { AnalyzeOptions, AnalyzeLiquidity } from './liquidity-service.js';
