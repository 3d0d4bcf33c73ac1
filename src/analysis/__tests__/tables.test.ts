import { describe, it, expect } from 'vitest';
import {
  toDetailedRecords,
  toFeeRecords,
  toRankingRecords,
  toReportRecord,
  toRpiRecords,
  toVenueRecords,
} from '../tables.js';
import { analyzeBook } from '../../__tests__/helpers/analysis.js';
import { rankBySize } from '../ranking.js';
import { Decimal } from '../../utils/decimal.js';
import { smallBook } from '../../__tests__/helpers/books.js';
import type { LiquidityReport, RpiQuote } from '../../core/types.js';

const rpi: RpiQuote = {
  apiBid: new Decimal('100'),
  apiAsk: new Decimal('101'),
  apiSpreadBps: new Decimal('100'),
  rpiBid: new Decimal('100.4'),
  rpiAsk: new Decimal('100.6'),
  rpiSpreadBps: new Decimal('19.920318725099601594'),
};

function buildReport(): LiquidityReport {
  const paradex = analyzeBook(smallBook({ exchange: 'Paradex', rpi }), [150, 500], 0);
  const hyperliquid = analyzeBook(smallBook({ exchange: 'Hyperliquid' }), [150, 500]);

  return {
    id: 'report-1',
    instrument: 'BTC',
    generatedAt: new Date('2024-05-01T12:00:00Z'),
    clipSizes: [150, 500],
    venues: [
      { exchange: 'Extended', status: 'error', code: 'FETCH_FAILURE', error: 'timed out after 8000ms' },
      { exchange: 'Hyperliquid', status: 'ok', analysis: hyperliquid },
      { exchange: 'Paradex', status: 'ok', analysis: paradex },
    ],
    rankings: rankBySize([hyperliquid, paradex]),
  };
}

describe('toVenueRecords', () => {
  it('rounds prices and spreads', () => {
    const [, hyperliquid] = toVenueRecords(buildReport());
    expect(hyperliquid).toEqual({
      exchange: 'Hyperliquid',
      status: 'ok',
      midPrice: 100.5,
      bestBid: 100,
      bestAsk: 101,
      spreadBps: 100,
      takerFeeBps: null,
      crossed: false,
      error: null,
    });
  });

  it('reports a known zero fee as 0', () => {
    const records = toVenueRecords(buildReport());
    expect(records[2]?.['takerFeeBps']).toBe(0);
  });

  it('keeps failed venues with their error code', () => {
    const [extended] = toVenueRecords(buildReport());
    expect(extended).toEqual({
      exchange: 'Extended',
      status: 'error',
      midPrice: null,
      bestBid: null,
      bestAsk: null,
      spreadBps: null,
      takerFeeBps: null,
      crossed: null,
      error: 'FETCH_FAILURE: timed out after 8000ms',
    });
  });
});

describe('toRpiRecords', () => {
  it('lists only venues with RPI quotes', () => {
    expect(toRpiRecords(buildReport())).toEqual([
      {
        exchange: 'Paradex',
        apiBid: 100,
        apiAsk: 101,
        apiSpreadBps: 100,
        rpiBid: 100.4,
        rpiAsk: 100.6,
        rpiSpreadBps: 19.92,
      },
    ]);
  });
});

describe('ranking records', () => {
  it('rounds the detailed breakdown to two decimals', () => {
    const table = buildReport().rankings.get(500);
    const records = table ? toDetailedRecords(table) : [];

    expect(records[0]).toEqual({
      rank: 1,
      exchange: 'Hyperliquid',
      slippageBps: 109.14,
      takerFeeBps: 0,
      totalCostBps: 109.14,
      filled: false,
      note: '* insufficient liquidity',
    });
  });

  it('summarizes each row as a cost breakdown', () => {
    const table = buildReport().rankings.get(150);
    const records = table ? toRankingRecords(table) : [];

    expect(records.map(r => r['breakdown'])).toEqual([
      '49.75 bps (slippage 49.75 + fee 0.00)',
      '49.75 bps (slippage 49.75 + fee 0.00)',
    ]);
    expect(records.map(r => r['medal'])).toEqual(['🥇', '🥈']);
  });
});

describe('toFeeRecords', () => {
  it('sorts by exchange name', () => {
    const records = toFeeRecords({
      Paradex: { bps: 0, assumption: 'zero fee' },
      Extended: { bps: 2.5, assumption: '' },
    });
    expect(records).toEqual([
      { exchange: 'Extended', takerFeeBps: 2.5, assumption: '' },
      { exchange: 'Paradex', takerFeeBps: 0, assumption: 'zero fee' },
    ]);
  });
});

describe('toReportRecord', () => {
  it('produces JSON-safe output', () => {
    const record = toReportRecord(buildReport());

    expect(record.id).toBe('report-1');
    expect(record.generatedAt).toBe('2024-05-01T12:00:00.000Z');
    expect(record.rankings.map(r => r.label)).toEqual(['$150', '$500']);
    expect(record.rankings[0]?.text.split('\n')).toHaveLength(2);
    expect(JSON.parse(JSON.stringify(record))).toEqual(record);
  });
});
