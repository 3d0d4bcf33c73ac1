import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import {
  extendedAdapter,
  getVenueAdapter,
  hyperliquidAdapter,
  lighterAdapter,
  pacificaAdapter,
  paradexAdapter,
} from '../venues/index.js';
import { FetchFailureError, MalformedOrderBookError, UnknownVenueError } from '../../core/errors.js';
import type { JsonHttpClient, JsonRequestOptions } from '../http-client.js';

interface RecordedCall {
  method: 'GET' | 'POST';
  url: string;
  body?: unknown;
  params?: JsonRequestOptions['params'];
}

function fixture(name: string): unknown {
  return JSON.parse(readFileSync(new URL(`./fixtures/${name}.json`, import.meta.url), 'utf-8'));
}

/**
 * Answers by URL suffix and records every call
 */
function fakeHttp(responses: Record<string, unknown>): JsonHttpClient & { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const answer = (url: string): unknown => {
    const key = Object.keys(responses).find(suffix => url.endsWith(suffix));
    if (key === undefined) throw new Error(`unexpected request ${url}`);
    return responses[key];
  };
  return {
    calls,
    async getJson(url, options) {
      calls.push({ method: 'GET', url, params: options?.params });
      return answer(url);
    },
    async postJson(url, body, options) {
      calls.push({ method: 'POST', url, body, params: options?.params });
      return answer(url);
    },
  };
}

const BASE = 'https://venue.test';

describe('venue fetchers', () => {
  it('Hyperliquid posts an l2Book request', async () => {
    const http = fakeHttp({ '/info': fixture('hyperliquid-btc') });
    const raw = await hyperliquidAdapter.fetchRaw({ http, instrument: 'BTC', baseUrl: BASE });

    expect(http.calls).toEqual([
      { method: 'POST', url: 'https://venue.test/info', body: { type: 'l2Book', coin: 'BTC' }, params: undefined },
    ]);
    expect(raw.venue).toBe('Hyperliquid');
    expect(raw.instrument).toBe('BTC');
    expect(hyperliquidAdapter.normalizer.parse(raw).bids).toHaveLength(3);
  });

  it('Paradex requests the interactive book with depth 100', async () => {
    const http = fakeHttp({ '/interactive': fixture('paradex-btc') });
    await paradexAdapter.fetchRaw({ http, instrument: 'ETH', baseUrl: BASE });

    expect(http.calls[0]?.url).toBe('https://venue.test/v1/orderbook/ETH-USD-PERP/interactive');
    expect(http.calls[0]?.params).toEqual({ depth: 100 });
  });

  it('Extended requests the market orderbook', async () => {
    const http = fakeHttp({ '/orderbook': fixture('extended-btc') });
    await extendedAdapter.fetchRaw({ http, instrument: 'SOL', baseUrl: BASE });

    expect(http.calls[0]?.url).toBe('https://venue.test/api/v1/info/markets/SOL-USD/orderbook');
  });

  it('Pacifica passes the symbol as a query parameter', async () => {
    const http = fakeHttp({ '/api/v1/book': fixture('pacifica-btc') });
    await pacificaAdapter.fetchRaw({ http, instrument: 'BTC', baseUrl: BASE });

    expect(http.calls[0]?.url).toBe('https://venue.test/api/v1/book');
    expect(http.calls[0]?.params).toEqual({ symbol: 'BTC' });
  });

  describe('Lighter', () => {
    it('resolves the active market id before fetching orders', async () => {
      const http = fakeHttp({
        '/orderBookDetails': fixture('lighter-markets'),
        '/orderBookOrders': fixture('lighter-btc'),
      });
      const raw = await lighterAdapter.fetchRaw({ http, instrument: 'btc', baseUrl: BASE });

      expect(http.calls.map(c => c.url)).toEqual([
        'https://venue.test/api/v1/orderBookDetails',
        'https://venue.test/api/v1/orderBookOrders',
      ]);
      expect(http.calls[1]?.params).toEqual({ market_id: 1, limit: 50 });
      expect(lighterAdapter.normalizer.parse(raw).asks).toHaveLength(2);
    });

    it('reports an inactive market as unavailable', async () => {
      const http = fakeHttp({ '/orderBookDetails': fixture('lighter-markets') });
      const fetching = lighterAdapter.fetchRaw({ http, instrument: 'DOGE', baseUrl: BASE });

      await expect(fetching).rejects.toBeInstanceOf(FetchFailureError);
      await expect(fetching).rejects.toMatchObject({ kind: 'UNAVAILABLE', venue: 'Lighter' });
    });

    it('rejects a malformed market list', async () => {
      const http = fakeHttp({ '/orderBookDetails': { order_book_details: 'none' } });
      await expect(lighterAdapter.fetchRaw({ http, instrument: 'BTC', baseUrl: BASE })).rejects.toBeInstanceOf(
        MalformedOrderBookError
      );
    });
  });

  it('looks adapters up by venue name', () => {
    expect(getVenueAdapter('Paradex')).toBe(paradexAdapter);
    expect(() => getVenueAdapter('paradex')).toThrow(UnknownVenueError);
  });
});
