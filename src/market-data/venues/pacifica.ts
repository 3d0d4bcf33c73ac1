/**
 * Pacifica: GET /api/v1/book?symbol=SYM; data.l = [bids, asks] of {p, a, n}
 */

import { z } from 'zod';
import { buildOrderBook, level, numericField, parsePayload, tagPayload } from '../levels.js';
import type { Normalizer, VenueAdapter, VenueFetchRequest } from './adapter.js';
import type { OrderBook, RawBookPayload } from '../../core/types.js';

const levelSchema = z.object({
  p: numericField,
  a: numericField,
  n: z.number().optional(),
});

const bookSchema = z.object({
  success: z.literal(true),
  data: z.object({
    s: z.string().optional(),
    l: z.tuple([z.array(levelSchema), z.array(levelSchema)]),
  }),
});

export const pacificaNormalizer: Normalizer = {
  venue: 'Pacifica',
  parse(raw: RawBookPayload): OrderBook {
    const { data } = parsePayload(bookSchema, raw);
    const [bids, asks] = data.l;
    return buildOrderBook(
      raw,
      bids.map(l => level(l.p, l.a)),
      asks.map(l => level(l.p, l.a))
    );
  },
};

export const pacificaAdapter: VenueAdapter = {
  venue: 'Pacifica',
  normalizer: pacificaNormalizer,
  async fetchRaw({ http, instrument, baseUrl, signal }: VenueFetchRequest): Promise<RawBookPayload> {
    const data = await http.getJson(`${baseUrl}/api/v1/book`, { params: { symbol: instrument }, signal });
    return tagPayload('Pacifica', instrument, data);
  },
};
