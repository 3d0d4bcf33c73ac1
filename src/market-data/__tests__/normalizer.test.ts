import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { normalize } from '../normalizer.js';
import { MalformedOrderBookError, UnknownVenueError } from '../../core/errors.js';
import { rawPayload } from '../../__tests__/helpers/books.js';
import type { OrderBook, PriceLevel, VenueName } from '../../core/types.js';

function fixture(name: string): unknown {
  return JSON.parse(readFileSync(new URL(`./fixtures/${name}.json`, import.meta.url), 'utf-8'));
}

function fixtureRecord(name: string): Record<string, unknown> {
  const data = fixture(name);
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new Error(`fixture ${name} is not an object`);
  }
  return Object.fromEntries(Object.entries(data));
}

function prices(levels: PriceLevel[]): number[] {
  return levels.map(l => l.price.toNumber());
}

function normalizeFixture(venue: VenueName, name: string): OrderBook {
  return normalize(venue, rawPayload(venue, fixture(name)));
}

describe('normalize', () => {
  describe('Hyperliquid', () => {
    it('sorts both sides and drops zero-size levels', () => {
      const book = normalizeFixture('Hyperliquid', 'hyperliquid-btc');

      expect(book.exchange).toBe('Hyperliquid');
      expect(book.instrument).toBe('BTC');
      expect(prices(book.bids)).toEqual([65000, 64999, 64998.5]);
      expect(prices(book.asks)).toEqual([65001, 65003.5]);
      expect(book.bids[0]?.quantity.toString()).toBe('1.2');
      expect(book.rpi).toBeUndefined();
    });

    it('rejects a payload with only one side', () => {
      const raw = rawPayload('Hyperliquid', { levels: [[{ px: '1', sz: '1' }]] });
      expect(() => normalize('Hyperliquid', raw)).toThrow(MalformedOrderBookError);
    });

    it('rejects non-numeric prices', () => {
      const raw = rawPayload('Hyperliquid', {
        levels: [[{ px: 'abc', sz: '1' }], [{ px: '2', sz: '1' }]],
      });
      expect(() => normalize('Hyperliquid', raw)).toThrow(/levels\.0\.0\.px: not a number/);
    });
  });

  describe('Paradex', () => {
    it('parses tuples and attaches RPI quotes', () => {
      const book = normalizeFixture('Paradex', 'paradex-btc');

      expect(prices(book.bids)).toEqual([64995.3, 64990.1]);
      expect(prices(book.asks)).toEqual([65001.4, 65005.2]);
      expect(book.rpi?.rpiBid.toString()).toBe('64997');
      expect(book.rpi?.rpiAsk.toString()).toBe('64999');
      expect(book.rpi?.rpiSpreadBps.toFixed(4)).toBe('0.3077');
      expect(book.rpi?.apiSpreadBps?.toFixed(4)).toBe('0.9385');
    });

    it('leaves API-side RPI fields null when absent', () => {
      const data = fixtureRecord('paradex-btc');
      delete data['best_bid_api'];
      const book = normalize('Paradex', rawPayload('Paradex', data));

      expect(book.rpi?.apiBid).toBeNull();
      expect(book.rpi?.apiSpreadBps).toBeNull();
      expect(book.rpi?.apiAsk?.toString()).toBe('65001.4');
    });

    it('treats empty quote arrays as absent', () => {
      const data = { ...fixtureRecord('paradex-btc'), best_bid_api: [], best_ask_interactive: [] };
      const book = normalize('Paradex', rawPayload('Paradex', data));

      expect(prices(book.bids)).toEqual([64995.3, 64990.1]);
      expect(prices(book.asks)).toEqual([65001.4, 65005.2]);
      expect(book.rpi).toBeUndefined();
    });

    it('keeps RPI with an empty API quote', () => {
      const data = { ...fixtureRecord('paradex-btc'), best_bid_api: [] };
      const book = normalize('Paradex', rawPayload('Paradex', data));

      expect(book.rpi?.apiBid).toBeNull();
      expect(book.rpi?.apiSpreadBps).toBeNull();
      expect(book.rpi?.rpiSpreadBps.toFixed(4)).toBe('0.3077');
    });

    it('omits RPI when interactive quotes are missing', () => {
      const book = normalize('Paradex', rawPayload('Paradex', { bids: [['10', '1']], asks: [['11', '1']] }));
      expect(book.rpi).toBeUndefined();
    });

    it('rejects a level tuple of the wrong length', () => {
      const raw = rawPayload('Paradex', { bids: [['64990.1']], asks: [['65001.4', '0.3']] });
      expect(() => normalize('Paradex', raw)).toThrow(MalformedOrderBookError);
    });
  });

  describe('Extended', () => {
    it('sorts unsorted levels', () => {
      const book = normalizeFixture('Extended', 'extended-btc');
      expect(prices(book.bids)).toEqual([64985, 64980]);
      expect(prices(book.asks)).toEqual([64989, 64990]);
    });

    it('rejects a non-OK status', () => {
      const raw = rawPayload('Extended', { status: 'ERROR', data: { bid: [], ask: [] } });
      expect(() => normalize('Extended', raw)).toThrow(MalformedOrderBookError);
    });
  });

  describe('Lighter', () => {
    it('reads remaining base amounts as quantities', () => {
      const book = normalizeFixture('Lighter', 'lighter-btc');
      expect(prices(book.bids)).toEqual([65002, 65000]);
      expect(prices(book.asks)).toEqual([65008.5, 65010]);
      expect(book.asks[0]?.quantity.toString()).toBe('0.4');
    });
  });

  describe('Pacifica', () => {
    it('parses the l array into bids and asks', () => {
      const book = normalizeFixture('Pacifica', 'pacifica-btc');
      expect(prices(book.bids)).toEqual([64975, 64970]);
      expect(prices(book.asks)).toEqual([64979, 64980]);
    });

    it('rejects an unsuccessful response', () => {
      const raw = rawPayload('Pacifica', { success: false, data: null });
      expect(() => normalize('Pacifica', raw)).toThrow(MalformedOrderBookError);
    });
  });

  it('rejects a side that is empty after dropping unusable levels', () => {
    const raw = rawPayload('Extended', {
      status: 'OK',
      data: { bid: [{ price: '0', qty: '1' }], ask: [{ price: '10', qty: '1' }] },
    });
    expect(() => normalize('Extended', raw)).toThrow('no usable bid levels');
  });

  it('rejects negative quantities', () => {
    const raw = rawPayload('Extended', {
      status: 'OK',
      data: { bid: [{ price: '9', qty: '-1' }], ask: [{ price: '10', qty: '1' }] },
    });
    expect(() => normalize('Extended', raw)).toThrow(/negative value/);
  });

  it('names venue and instrument in the error', () => {
    const raw = rawPayload('Pacifica', { success: true }, 'ETH');
    try {
      normalize('Pacifica', raw);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedOrderBookError);
      if (error instanceof MalformedOrderBookError) {
        expect(error.venue).toBe('Pacifica');
        expect(error.instrument).toBe('ETH');
        expect(error.code).toBe('MALFORMED_ORDER_BOOK');
      }
    }
  });

  it('throws UnknownVenueError for an unregistered venue', () => {
    expect(() => normalize('Binance', rawPayload('Hyperliquid', {}))).toThrow(UnknownVenueError);
  });
});
