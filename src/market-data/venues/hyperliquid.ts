/**
 * Hyperliquid: POST /info {type: "l2Book"}; levels = [bids, asks] of {px, sz, n}
 */

import { z } from 'zod';
import { buildOrderBook, level, numericField, parsePayload, tagPayload } from '../levels.js';
import type { Normalizer, VenueAdapter, VenueFetchRequest } from './adapter.js';
import type { OrderBook, RawBookPayload } from '../../core/types.js';

const levelSchema = z.object({
  px: numericField,
  sz: numericField,
  n: z.number().optional(),
});

const bookSchema = z.object({
  coin: z.string().optional(),
  time: z.number().optional(),
  levels: z.tuple([z.array(levelSchema), z.array(levelSchema)]),
});

export const hyperliquidNormalizer: Normalizer = {
  venue: 'Hyperliquid',
  parse(raw: RawBookPayload): OrderBook {
    const { levels } = parsePayload(bookSchema, raw);
    const [bids, asks] = levels;
    return buildOrderBook(
      raw,
      bids.map(l => level(l.px, l.sz)),
      asks.map(l => level(l.px, l.sz))
    );
  },
};

export const hyperliquidAdapter: VenueAdapter = {
  venue: 'Hyperliquid',
  normalizer: hyperliquidNormalizer,
  async fetchRaw({ http, instrument, baseUrl, signal }: VenueFetchRequest): Promise<RawBookPayload> {
    const data = await http.postJson(`${baseUrl}/info`, { type: 'l2Book', coin: instrument }, { signal });
    return tagPayload('Hyperliquid', instrument, data);
  },
};
