/**
 * Tabular export of analysis results as plain rows (JSON, CLI tables).
 * bps values are rounded to 2 decimals and prices to 6.
 */

import { roundNullable, roundToNumber } from '../utils/decimal.js';
import { formatCostBreakdown, renderRankingsText } from './ranking.js';
import type {
  LiquidityReport,
  RankingTable,
  TableRecord,
  TakerFeeTable,
} from '../core/types.js';

const BPS_DP = 2;
const PRICE_DP = 6;

export function toRankingRecords(table: RankingTable): TableRecord[] {
  return table.rows.map(row => ({
    rank: row.rank,
    medal: row.medal,
    exchange: row.exchange,
    breakdown: formatCostBreakdown(row),
    note: row.note,
  }));
}

export function toDetailedRecords(table: RankingTable): TableRecord[] {
  return table.rows.map(row => ({
    rank: row.rank,
    exchange: row.exchange,
    slippageBps: roundNullable(row.slippageBps, BPS_DP),
    takerFeeBps: roundToNumber(row.takerFeeBps, BPS_DP),
    totalCostBps: roundNullable(row.totalCostBps, BPS_DP),
    filled: row.filled,
    note: row.note,
  }));
}

/**
 * One row per venue, successful or not
 */
export function toVenueRecords(report: LiquidityReport): TableRecord[] {
  return report.venues.map(venue => {
    if (venue.status === 'error') {
      return {
        exchange: venue.exchange,
        status: 'error',
        midPrice: null,
        bestBid: null,
        bestAsk: null,
        spreadBps: null,
        takerFeeBps: null,
        crossed: null,
        error: `${venue.code}: ${venue.error}`,
      };
    }

    const { analysis } = venue;
    return {
      exchange: venue.exchange,
      status: 'ok',
      midPrice: roundToNumber(analysis.midPrice, PRICE_DP),
      bestBid: roundToNumber(analysis.bestBid, PRICE_DP),
      bestAsk: roundToNumber(analysis.bestAsk, PRICE_DP),
      spreadBps: roundToNumber(analysis.spreadBps, BPS_DP),
      takerFeeBps: analysis.takerFeeKnown ? roundToNumber(analysis.takerFeeBps, BPS_DP) : null,
      crossed: analysis.crossed,
      error: null,
    };
  });
}

/**
 * Paradex-style RPI quotes, for venues that publish them
 */
export function toRpiRecords(report: LiquidityReport): TableRecord[] {
  const records: TableRecord[] = [];
  for (const venue of report.venues) {
    if (venue.status !== 'ok' || !venue.analysis.rpi) continue;
    const rpi = venue.analysis.rpi;
    records.push({
      exchange: venue.exchange,
      apiBid: roundNullable(rpi.apiBid, PRICE_DP),
      apiAsk: roundNullable(rpi.apiAsk, PRICE_DP),
      apiSpreadBps: roundNullable(rpi.apiSpreadBps, BPS_DP),
      rpiBid: roundToNumber(rpi.rpiBid, PRICE_DP),
      rpiAsk: roundToNumber(rpi.rpiAsk, PRICE_DP),
      rpiSpreadBps: roundToNumber(rpi.rpiSpreadBps, BPS_DP),
    });
  }
  return records;
}

/**
 * Fee table sorted by exchange name
 */
export function toFeeRecords(table: TakerFeeTable): TableRecord[] {
  return Object.entries(table)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([exchange, entry]) => ({
      exchange,
      takerFeeBps: entry.bps,
      assumption: entry.assumption,
    }));
}

export interface RankingTableRecord {
  notionalUsd: number;
  label: string;
  rows: TableRecord[];
  summary: TableRecord[];
  text: string;
}

export interface ReportRecord {
  id: string;
  instrument: string;
  generatedAt: string;
  clipSizes: number[];
  venues: TableRecord[];
  rpi: TableRecord[];
  rankings: RankingTableRecord[];
}

/**
 * Whole report as JSON-safe data (API responses, --json output)
 */
export function toReportRecord(report: LiquidityReport): ReportRecord {
  return {
    id: report.id,
    instrument: report.instrument,
    generatedAt: report.generatedAt.toISOString(),
    clipSizes: report.clipSizes,
    venues: toVenueRecords(report),
    rpi: toRpiRecords(report),
    rankings: [...report.rankings.values()].map(table => ({
      notionalUsd: table.notionalUsd,
      label: table.label,
      rows: toDetailedRecords(table),
      summary: toRankingRecords(table),
      text: renderRankingsText(table),
    })),
  };
}
