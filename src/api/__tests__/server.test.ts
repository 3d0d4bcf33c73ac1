import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { createApiServer } from '../server.js';
import { parseConfig } from '../../config/index.js';
import { InvalidInstrumentError, FetchFailureError } from '../../core/errors.js';
import { analyzeBook } from '../../__tests__/helpers/analysis.js';
import { rankBySize } from '../../analysis/ranking.js';
import { smallBook } from '../../__tests__/helpers/books.js';
import type { AnalyzeLiquidity } from '../../analysis/liquidity-service.js';
import type { LiquidityReport } from '../../core/types.js';

const config = parseConfig({
  analysis: { instruments: ['BTC', 'ETH'], defaultInstrument: 'BTC' },
  fees: { takerFeesBps: { Paradex: { bps: 0, assumption: 'zero fee' }, Hyperliquid: { bps: 4 } } },
});

function report(instrument: string): LiquidityReport {
  const analysis = analyzeBook(smallBook({ exchange: 'Paradex', instrument }), [150], 0);
  return {
    id: 'report-1',
    instrument,
    generatedAt: new Date('2024-05-01T12:00:00Z'),
    clipSizes: [150],
    venues: [{ exchange: 'Paradex', status: 'ok', analysis }],
    rankings: rankBySize([analysis]),
  };
}

function setup(analyze: AnalyzeLiquidity = async instrument => report(instrument), overrides = config) {
  const analyzeMock = vi.fn<AnalyzeLiquidity>(analyze);
  return { app: createApiServer({ analyze: analyzeMock, config: overrides }), analyze: analyzeMock };
}

describe('API server', () => {
  it('reports health', async () => {
    const { app } = setup();
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.data.status).toBe('ok');
  });

  it('lists the fee table', async () => {
    const { app } = setup();
    const res = await request(app).get('/api/fees');

    expect(res.body.data).toEqual([
      { exchange: 'Hyperliquid', takerFeeBps: 4, assumption: '' },
      { exchange: 'Paradex', takerFeeBps: 0, assumption: 'zero fee' },
    ]);
  });

  it('lists supported instruments', async () => {
    const { app } = setup();
    const res = await request(app).get('/api/instruments');

    expect(res.body.data).toEqual({ instruments: ['BTC', 'ETH'], defaultInstrument: 'BTC' });
  });

  it('returns a serialized report', async () => {
    const { app, analyze } = setup();
    const res = await request(app).get('/api/liquidity/eth');

    expect(res.status).toBe(200);
    expect(analyze).toHaveBeenCalledWith('ETH', { config });
    expect(res.body.data.instrument).toBe('ETH');
    expect(res.body.data.generatedAt).toBe('2024-05-01T12:00:00.000Z');
    expect(res.body.data.rankings[0].summary[0].breakdown).toBe('49.75 bps (slippage 49.75 + fee 0.00)');
  });

  it('rejects instruments outside the configured list', async () => {
    const { app, analyze } = setup();
    const res = await request(app).get('/api/liquidity/doge');

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ success: false, error: 'Unsupported instrument: DOGE' });
    expect(analyze).not.toHaveBeenCalled();
  });

  it('maps invalid instrument errors to 400', async () => {
    const { app } = setup(async instrument => {
      throw new InvalidInstrumentError(instrument, 'not listed');
    });
    const res = await request(app).get('/api/liquidity/BTC');

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Invalid instrument BTC: not listed');
  });

  it('hides internal failures behind a 500', async () => {
    const { app } = setup(async () => {
      throw new FetchFailureError('Paradex', 'NETWORK', 'socket hang up');
    });
    const res = await request(app).get('/api/liquidity/BTC');

    expect(res.status).toBe(500);
    expect(res.body).toMatchObject({ success: false, error: 'Liquidity analysis failed' });
  });

  it('rate limits per client', async () => {
    const limited = parseConfig({ api: { rateLimitMaxRequests: 2 } });
    const { app } = setup(undefined, limited);

    expect((await request(app).get('/health')).status).toBe(200);
    expect((await request(app).get('/health')).status).toBe(200);
    const res = await request(app).get('/health');

    expect(res.status).toBe(429);
    expect(res.body.error).toBe('Rate limit exceeded');
  });
});
