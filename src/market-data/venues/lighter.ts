/**
 * Lighter: resolve market_id from /api/v1/orderBookDetails, then read
 * /api/v1/orderBookOrders?market_id=..&limit=50
 */

import { z } from 'zod';
import { BOOK_DEPTH } from '../../core/constants.js';
import { FetchFailureError, MalformedOrderBookError } from '../../core/errors.js';
import { buildOrderBook, level, numericField, parsePayload, tagPayload } from '../levels.js';
import type { JsonHttpClient } from '../http-client.js';
import type { Normalizer, VenueAdapter, VenueFetchRequest } from './adapter.js';
import type { OrderBook, RawBookPayload } from '../../core/types.js';

const marketSchema = z
  .object({
    symbol: z.string(),
    market_id: z.number().int(),
    status: z.string(),
  })
  .passthrough();

const marketListSchema = z.object({
  order_book_details: z.array(marketSchema),
});

const orderSchema = z.object({
  price: numericField,
  remaining_base_amount: numericField,
});

const bookSchema = z.object({
  bids: z.array(orderSchema),
  asks: z.array(orderSchema),
});

/**
 * Find the active market for an instrument. Symbols compare case-insensitively.
 */
export async function resolveLighterMarketId(
  http: JsonHttpClient,
  baseUrl: string,
  instrument: string,
  signal?: AbortSignal
): Promise<number> {
  const data = await http.getJson(`${baseUrl}/api/v1/orderBookDetails`, { signal });
  const parsed = marketListSchema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedOrderBookError('Lighter', instrument, `market list: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const market = parsed.data.order_book_details.find(
    m => m.symbol.toUpperCase() === instrument.toUpperCase() && m.status === 'active'
  );
  if (!market) {
    throw new FetchFailureError('Lighter', 'UNAVAILABLE', `${instrument} is not listed as an active market`);
  }
  return market.market_id;
}

export const lighterNormalizer: Normalizer = {
  venue: 'Lighter',
  parse(raw: RawBookPayload): OrderBook {
    const book = parsePayload(bookSchema, raw);
    return buildOrderBook(
      raw,
      book.bids.map(o => level(o.price, o.remaining_base_amount)),
      book.asks.map(o => level(o.price, o.remaining_base_amount))
    );
  },
};

export const lighterAdapter: VenueAdapter = {
  venue: 'Lighter',
  normalizer: lighterNormalizer,
  async fetchRaw({ http, instrument, baseUrl, signal }: VenueFetchRequest): Promise<RawBookPayload> {
    const marketId = await resolveLighterMarketId(http, baseUrl, instrument, signal);
    const data = await http.getJson(`${baseUrl}/api/v1/orderBookOrders`, {
      params: { market_id: marketId, limit: BOOK_DEPTH.LIGHTER_LIMIT },
      signal,
    });
    return tagPayload('Lighter', instrument, data);
  },
};
