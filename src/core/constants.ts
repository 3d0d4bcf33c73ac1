/**
 * Constants for the Perp Liquidity Analyzer
 *
 * Venue endpoints and fee assumptions reflect the public venue docs.
 * Update if a venue changes its API or fee schedule.
 */

import type { TakerFeeTable, VenueName } from './types.js';

// ============================================================================
// VENUES
// ============================================================================

/**
 * Supported perpetuals venues, alphabetical
 */
export const VENUES = ['Extended', 'Hyperliquid', 'Lighter', 'Pacifica', 'Paradex'] as const;

export const VENUE_BASE_URLS: Record<VenueName, string> = {
  Extended: 'https://api.starknet.extended.exchange',
  Hyperliquid: 'https://api.hyperliquid.xyz',
  Lighter: 'https://mainnet.zklighter.elliot.ai',
  Pacifica: 'https://api.pacifica.fi',
  Paradex: 'https://api.prod.paradex.trade',
} as const;

/**
 * Order book depth requested from venues that accept a depth parameter
 */
export const BOOK_DEPTH = {
  PARADEX_DEPTH: 100,
  LIGHTER_LIMIT: 50,
} as const;

// ============================================================================
// ANALYSIS
// ============================================================================

/**
 * Notional clip sizes in USD
 */
export const CLIP_SIZES = [1_000, 10_000, 50_000, 100_000, 500_000] as const;

/**
 * Instruments offered for selection
 */
export const INSTRUMENTS = ['BTC', 'ETH', 'SOL', 'XRP', 'HYPE', 'BNB'] as const;

export const DEFAULT_INSTRUMENT = 'BTC';

export const INSTRUMENT_PATTERN = /^[A-Z0-9]{1,20}$/;

/**
 * Default taker fees (bps) and the tier each assumes
 */
export const DEFAULT_TAKER_FEES: TakerFeeTable = {
  Extended: { bps: 2.5, assumption: '' },
  Hyperliquid: { bps: 4, assumption: '>5M 14D volume, 0 HYPE staked' },
  Lighter: { bps: 2, assumption: 'Premium Account' },
  Pacifica: { bps: 4, assumption: '' },
  Paradex: { bps: 0, assumption: '' },
};

export const NOTES = {
  INSUFFICIENT_LIQUIDITY: '* insufficient liquidity',
  CROSSED_BOOK: '* crossed book',
} as const;

export const MEDALS: Record<number, string> = {
  1: '🥇',
  2: '🥈',
  3: '🥉',
};

// ============================================================================
// FETCH CONSTANTS
// ============================================================================

export const FETCH = {
  DEFAULT_TIMEOUT_MS: 15_000,
  MIN_TIMEOUT_MS: 1_000,
  MAX_TIMEOUT_MS: 60_000,
  USER_AGENT: 'perp-liquidity-analyzer/1.0',
} as const;

// ============================================================================
// API CONSTANTS
// ============================================================================

export const API = {
  DEFAULT_PORT: 3000,
  RATE_LIMIT_WINDOW_MS: 60_000,  // 1 minute
  RATE_LIMIT_MAX_REQUESTS: 30,   // Each request fans out to every venue
} as const;

// ============================================================================
// LOGGING CONSTANTS
// ============================================================================

export const LOGGING = {
  DEFAULT_LEVEL: 'info',
  FILE_MAX_SIZE: 10 * 1024 * 1024,
  FILE_MAX_FILES: 10,
  LOG_DIR: './logs/',
} as const;

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

export function isVenueName(value: string): value is VenueName {
  return VENUES.some(venue => venue === value);
}
