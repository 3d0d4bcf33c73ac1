/**
 * Paradex: GET /v1/orderbook/{SYM}-USD-PERP/interactive?depth=100
 *
 * The interactive book carries both the API best quotes and the retail
 * price improvement (RPI) quotes, which are surfaced as OrderBook.rpi.
 */

import { z } from 'zod';
import { BOOK_DEPTH } from '../../core/constants.js';
import { buildOrderBook, level, numericField, parsePayload, tagPayload } from '../levels.js';
import { Decimal, toBps } from '../../utils/decimal.js';
import type { Normalizer, VenueAdapter, VenueFetchRequest } from './adapter.js';
import type { OrderBook, RawBookPayload, RpiQuote } from '../../core/types.js';

const levelSchema = z.tuple([numericField, numericField]);

// [price, size, ...] -> price; an empty or missing quote is absent
const quoteSchema = z
  .tuple([numericField])
  .rest(z.unknown())
  .or(z.tuple([]).transform(() => null))
  .nullish()
  .transform(quote => quote?.[0] ?? null);

const bookSchema = z.object({
  market: z.string().optional(),
  bids: z.array(levelSchema),
  asks: z.array(levelSchema),
  best_bid_api: quoteSchema,
  best_ask_api: quoteSchema,
  best_bid_interactive: quoteSchema,
  best_ask_interactive: quoteSchema,
});

type ParadexBook = z.infer<typeof bookSchema>;

export function paradexMarket(instrument: string): string {
  return `${instrument}-USD-PERP`;
}

function spreadBps(bid: Decimal, ask: Decimal): Decimal {
  return toBps(ask.minus(bid), bid);
}

/**
 * RPI quotes exist only when both interactive sides are present and priced
 */
export function extractRpiQuote(book: ParadexBook): RpiQuote | null {
  const rpiBid = book.best_bid_interactive;
  const rpiAsk = book.best_ask_interactive;
  if (!rpiBid || !rpiAsk || rpiBid.isZero() || rpiAsk.isZero()) {
    return null;
  }

  const apiBid = book.best_bid_api;
  const apiAsk = book.best_ask_api;
  const apiSpreadBps =
    apiBid && apiAsk && !apiBid.isZero() && !apiAsk.isZero() ? spreadBps(apiBid, apiAsk) : null;

  return {
    apiBid,
    apiAsk,
    apiSpreadBps,
    rpiBid,
    rpiAsk,
    rpiSpreadBps: spreadBps(rpiBid, rpiAsk),
  };
}

export const paradexNormalizer: Normalizer = {
  venue: 'Paradex',
  parse(raw: RawBookPayload): OrderBook {
    const book = parsePayload(bookSchema, raw);
    const rpi = extractRpiQuote(book);
    return buildOrderBook(
      raw,
      book.bids.map(([price, qty]) => level(price, qty)),
      book.asks.map(([price, qty]) => level(price, qty)),
      rpi ? { rpi } : {}
    );
  },
};

export const paradexAdapter: VenueAdapter = {
  venue: 'Paradex',
  normalizer: paradexNormalizer,
  async fetchRaw({ http, instrument, baseUrl, signal }: VenueFetchRequest): Promise<RawBookPayload> {
    const url = `${baseUrl}/v1/orderbook/${paradexMarket(instrument)}/interactive`;
    const data = await http.getJson(url, { params: { depth: BOOK_DEPTH.PARADEX_DEPTH }, signal });
    return tagPayload('Paradex', instrument, data);
  },
};
