/**
 * Extended: GET /api/v1/info/markets/{SYM}-USD/orderbook
 */

import { z } from 'zod';
import { buildOrderBook, level, numericField, parsePayload, tagPayload } from '../levels.js';
import type { Normalizer, VenueAdapter, VenueFetchRequest } from './adapter.js';
import type { OrderBook, RawBookPayload } from '../../core/types.js';

const levelSchema = z.object({
  price: numericField,
  qty: numericField,
});

const bookSchema = z.object({
  status: z.literal('OK'),
  data: z.object({
    market: z.string().optional(),
    bid: z.array(levelSchema),
    ask: z.array(levelSchema),
  }),
});

export function extendedMarket(instrument: string): string {
  return `${instrument}-USD`;
}

export const extendedNormalizer: Normalizer = {
  venue: 'Extended',
  parse(raw: RawBookPayload): OrderBook {
    const { data } = parsePayload(bookSchema, raw);
    return buildOrderBook(
      raw,
      data.bid.map(l => level(l.price, l.qty)),
      data.ask.map(l => level(l.price, l.qty))
    );
  },
};

export const extendedAdapter: VenueAdapter = {
  venue: 'Extended',
  normalizer: extendedNormalizer,
  async fetchRaw({ http, instrument, baseUrl, signal }: VenueFetchRequest): Promise<RawBookPayload> {
    const url = `${baseUrl}/api/v1/info/markets/${extendedMarket(instrument)}/orderbook`;
    const data = await http.getJson(url, { signal });
    return tagPayload('Extended', instrument, data);
  },
};
