/**
 * Core Type Definitions for the Perp Liquidity Analyzer
 *
 * IMPORTANT: All prices, quantities and cost metrics use Decimal.js.
 * Native numbers appear only for notional clip sizes (integer USD keys)
 * and in the tabular export layer.
 */

import { Decimal } from '../utils/decimal.js';
import type { VENUES } from './constants.js';

// ============================================================================
// ENUMS
// ============================================================================

export type VenueName = (typeof VENUES)[number];
export type FillSide = 'buy' | 'sell';
export type FetchFailureKind = 'TIMEOUT' | 'HTTP' | 'NETWORK' | 'UNAVAILABLE';
export type FillErrorReason = 'No liquidity' | 'No reference price';

/**
 * Per-venue outcome. Fetch tasks never reject; they resolve to one of these.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

// ============================================================================
// ORDER BOOK TYPES
// ============================================================================

export interface PriceLevel {
  price: Decimal;
  quantity: Decimal;
}

/**
 * Paradex retail price improvement quotes alongside the API book
 */
export interface RpiQuote {
  apiBid: Decimal | null;
  apiAsk: Decimal | null;
  apiSpreadBps: Decimal | null;
  rpiBid: Decimal;
  rpiAsk: Decimal;
  rpiSpreadBps: Decimal;
}

/**
 * Canonical order book, produced by a venue normalizer
 */
export interface OrderBook {
  exchange: VenueName;
  instrument: string;
  bids: PriceLevel[];   // Sorted high to low
  asks: PriceLevel[];   // Sorted low to high
  receivedAt: Date;
  rpi?: RpiQuote;
}

/**
 * Venue-native payload as returned by a fetcher, tagged with its venue
 */
export interface RawBookPayload {
  venue: VenueName;
  instrument: string;
  receivedAt: Date;
  data: unknown;
}

/**
 * Top of book summary
 */
export interface BookTop {
  bestBid: Decimal;
  bestAsk: Decimal;
  midPrice: Decimal;
  spreadBps: Decimal;
  crossed: boolean;
}

// ============================================================================
// SIMULATION TYPES
// ============================================================================

/**
 * Result of walking one side of the book with a market order
 */
export interface FillResult {
  side: FillSide;
  notionalUsd: Decimal;
  slippagePercent: Decimal | null;
  slippageBps: Decimal | null;
  effectiveSpreadBps: Decimal | null;
  filled: boolean;
  filledPercent: Decimal;
  levelsUsed: number;
  depthUsedNotional: Decimal;
  filledQuantity: Decimal;
  midPrice: Decimal | null;
  bestPrice: Decimal | null;
  worstPrice: Decimal | null;
  avgPrice: Decimal | null;
  error?: FillErrorReason;
}

export interface PerSide<T> {
  buy: T;
  sell: T;
}

/**
 * Buy and sell fills combined for one clip size
 */
export interface SizeAnalysis {
  notionalUsd: number;
  avgSlippageBps: Decimal | null;
  takerFeeBps: Decimal;
  totalCostBps: Decimal | null;
  effectiveSpreadBps: Decimal | null;
  filled: boolean;
  filledPercent: Decimal;
  levelsUsed: PerSide<number>;
  depthUsed: PerSide<Decimal>;
  buy: FillResult;
  sell: FillResult;
  notes: string[];
}

export interface VenueAnalysis {
  exchange: VenueName;
  instrument: string;
  bestBid: Decimal;
  bestAsk: Decimal;
  midPrice: Decimal;
  spreadBps: Decimal;
  crossed: boolean;
  takerFeeBps: Decimal;
  takerFeeKnown: boolean;
  rpi: RpiQuote | null;
  slippageBySize: Map<number, SizeAnalysis>;
}

// ============================================================================
// RANKING TYPES
// ============================================================================

export interface RankingRow {
  rank: number;
  medal: string;
  exchange: VenueName;
  slippageBps: Decimal | null;
  takerFeeBps: Decimal;
  totalCostBps: Decimal | null;
  filled: boolean;
  crossed: boolean;
  note: string;
}

export interface RankingTable {
  notionalUsd: number;
  label: string;
  rows: RankingRow[];
}

// ============================================================================
// REPORT TYPES
// ============================================================================

export type VenueReport =
  | { exchange: VenueName; status: 'ok'; analysis: VenueAnalysis }
  | { exchange: VenueName; status: 'error'; code: string; error: string };

export interface LiquidityReport {
  id: string;
  instrument: string;
  generatedAt: Date;
  clipSizes: number[];
  venues: VenueReport[];
  rankings: Map<number, RankingTable>;
}

// ============================================================================
// FEE TYPES
// ============================================================================

export interface TakerFeeEntry {
  bps: number;
  assumption: string;
}

export type TakerFeeTable = Record<string, TakerFeeEntry>;

// ============================================================================
// CONFIGURATION TYPES
// ============================================================================

export interface FetchConfig {
  timeoutMs: number;
  venues: VenueName[];
  baseUrls: Record<VenueName, string>;
}

export interface AnalysisConfig {
  clipSizes: number[];
  instruments: string[];
  defaultInstrument: string;
}

export interface FeeConfig {
  takerFeesBps: TakerFeeTable;
}

export interface ApiConfig {
  enabled: boolean;
  port: number;
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
}

export interface SystemConfig {
  fetch: FetchConfig;
  analysis: AnalysisConfig;
  fees: FeeConfig;
  api: ApiConfig;
}

// ============================================================================
// EVENT TYPES
// ============================================================================

export type SystemEventType =
  | 'ANALYSIS_STARTED'
  | 'BOOK_FETCHED'
  | 'VENUE_FAILED'
  | 'VENUE_ANALYZED'
  | 'ANALYSIS_COMPLETED';

export interface SystemEvent<T = unknown> {
  type: SystemEventType;
  payload: T;
  timestamp: Date;
}

// ============================================================================
// API TYPES
// ============================================================================

/**
 * API response wrapper
 */
export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  timestamp: Date;
}

export type TableCell = string | number | boolean | null;
export type TableRecord = Record<string, TableCell>;
