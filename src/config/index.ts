/**
 * Configuration Management for the Perp Liquidity Analyzer
 *
 * Loads configuration from environment variables and an optional JSON file.
 * Validates configuration using Zod schemas. The taker-fee table lives here
 * and is passed into the analyzer; callers refresh it with loadConfig(true).
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { ConfigurationError, InvalidConfigError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import {
  API,
  CLIP_SIZES,
  DEFAULT_INSTRUMENT,
  DEFAULT_TAKER_FEES,
  FETCH,
  INSTRUMENTS,
  INSTRUMENT_PATTERN,
  VENUES,
  VENUE_BASE_URLS,
} from '../core/constants.js';
import type { SystemConfig, TakerFeeTable } from '../core/types.js';

// Load environment variables
dotenv.config();

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

const venueSchema = z.enum(VENUES);

const fetchConfigSchema = z.object({
  timeoutMs: z.number().int().min(FETCH.MIN_TIMEOUT_MS).max(FETCH.MAX_TIMEOUT_MS).default(FETCH.DEFAULT_TIMEOUT_MS),
  venues: z.array(venueSchema).min(1, 'At least one venue is required').default([...VENUES]),
  baseUrls: z.object({
    Extended: z.string().url().default(VENUE_BASE_URLS.Extended),
    Hyperliquid: z.string().url().default(VENUE_BASE_URLS.Hyperliquid),
    Lighter: z.string().url().default(VENUE_BASE_URLS.Lighter),
    Pacifica: z.string().url().default(VENUE_BASE_URLS.Pacifica),
    Paradex: z.string().url().default(VENUE_BASE_URLS.Paradex),
  }).default({}),
});

const analysisConfigSchema = z.object({
  clipSizes: z.array(z.number().positive().finite()).min(1).default([...CLIP_SIZES]),
  instruments: z.array(z.string().regex(INSTRUMENT_PATTERN)).min(1).default([...INSTRUMENTS]),
  defaultInstrument: z.string().regex(INSTRUMENT_PATTERN).default(DEFAULT_INSTRUMENT),
});

const takerFeeEntrySchema = z.object({
  bps: z.number().min(0).max(100),
  assumption: z.string().default(''),
});

const feeConfigSchema = z.object({
  takerFeesBps: z.record(takerFeeEntrySchema).default(DEFAULT_TAKER_FEES),
});

const apiConfigSchema = z.object({
  enabled: z.boolean().default(false),
  port: z.number().int().min(1).max(65535).default(API.DEFAULT_PORT),
  rateLimitWindowMs: z.number().int().min(1000).default(API.RATE_LIMIT_WINDOW_MS),
  rateLimitMaxRequests: z.number().int().min(1).default(API.RATE_LIMIT_MAX_REQUESTS),
});

export const systemConfigSchema = z.object({
  fetch: fetchConfigSchema.default({}),
  analysis: analysisConfigSchema.default({}),
  fees: feeConfigSchema.default({}),
  api: apiConfigSchema.default({}),
});

// ============================================================================
// CONFIGURATION LOADING
// ============================================================================

let cachedConfig: SystemConfig | null = null;

/**
 * Load configuration from environment and config file
 */
export function loadConfig(forceReload = false): SystemConfig {
  if (cachedConfig && !forceReload) {
    return cachedConfig;
  }

  logger.debug('Loading configuration...');

  let rawConfig: Record<string, unknown> = {
    fetch: compact({
      timeoutMs: parseEnvNumber(process.env['FETCH_TIMEOUT_MS']),
      venues: parseEnvArray(process.env['LIQUIDITY_VENUES']),
    }),
    analysis: compact({
      clipSizes: parseEnvNumberArray(process.env['LIQUIDITY_CLIP_SIZES']),
      instruments: parseEnvArray(process.env['LIQUIDITY_INSTRUMENTS'])?.map(s => s.toUpperCase()),
      defaultInstrument: process.env['LIQUIDITY_DEFAULT_INSTRUMENT']?.toUpperCase(),
    }),
    fees: compact({
      takerFeesBps: parseEnvFeeTable(process.env['TAKER_FEES_BPS']),
    }),
    api: compact({
      enabled: parseEnvBoolean(process.env['API_ENABLED']),
      port: parseEnvNumber(process.env['API_PORT']),
    }),
  };

  // Load config file if exists
  const configPath = process.env['CONFIG_PATH'] ?? './config/default.json';
  if (existsSync(configPath)) {
    try {
      const fileConfig: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
      if (isRecord(fileConfig)) {
        rawConfig = deepMerge(rawConfig, fileConfig);
        logger.debug(`Loaded config file: ${configPath}`);
      } else {
        logger.warn(`Ignoring config file that is not a JSON object: ${configPath}`);
      }
    } catch (error) {
      logger.warn(`Failed to load config file: ${configPath}`, { error: String(error) });
    }
  }

  cachedConfig = parseConfig(rawConfig);

  logger.debug('Configuration loaded', {
    venues: cachedConfig.fetch.venues,
    clipSizes: cachedConfig.analysis.clipSizes,
    timeoutMs: cachedConfig.fetch.timeoutMs,
  });

  return cachedConfig;
}

/**
 * Validate a raw configuration object
 */
export function parseConfig(rawConfig: unknown): SystemConfig {
  const result = systemConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration:\n${errors.join('\n')}`, { issues: errors });
  }

  return result.data;
}

/**
 * Get current config (throws if not loaded)
 */
export function getConfig(): SystemConfig {
  if (!cachedConfig) {
    throw new ConfigurationError('Configuration not loaded. Call loadConfig() first.');
  }
  return cachedConfig;
}

/**
 * Drop the cached config (tests, fee table refresh)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

function parseEnvNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const num = Number(value);
  return isNaN(num) ? undefined : num;
}

function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseEnvArray(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function parseEnvNumberArray(value: string | undefined): number[] | undefined {
  return parseEnvArray(value)?.map(s => Number(s.replace(/_/g, '')));
}

/**
 * Parse "Hyperliquid:4,Paradex:0" into a fee table
 */
export function parseEnvFeeTable(value: string | undefined): TakerFeeTable | undefined {
  const entries = parseEnvArray(value);
  if (!entries) return undefined;

  const table: TakerFeeTable = {};
  for (const entry of entries) {
    const [venue, bps] = entry.split(':').map(s => s.trim());
    const parsed = Number(bps);
    if (!venue || bps === undefined || bps === '' || isNaN(parsed)) {
      throw new InvalidConfigError('TAKER_FEES_BPS', entry, 'expected Venue:bps');
    }
    table[venue] = { bps: parsed, assumption: DEFAULT_TAKER_FEES[venue]?.assumption ?? '' };
  }
  return table;
}

function compact(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// DEFAULT CONFIG FILE
// ============================================================================

export const defaultConfigFile = `{
  "fetch": {
    "timeoutMs": 15000,
    "venues": ["Extended", "Hyperliquid", "Lighter", "Pacifica", "Paradex"]
  },
  "analysis": {
    "clipSizes": [1000, 10000, 50000, 100000, 500000],
    "instruments": ["BTC", "ETH", "SOL", "XRP", "HYPE", "BNB"]
  },
  "fees": {
    "takerFeesBps": {
      "Hyperliquid": { "bps": 4, "assumption": ">5M 14D volume, 0 HYPE staked" },
      "Extended": { "bps": 2.5 },
      "Lighter": { "bps": 2, "assumption": "Premium Account" },
      "Paradex": { "bps": 0 },
      "Pacifica": { "bps": 4 }
    }
  },
  "api": {
    "enabled": false,
    "port": 3000
  }
}`;
