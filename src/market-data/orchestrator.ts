/**
 * Fetch Orchestrator
 *
 * Fetches one order book per venue concurrently. Every venue task resolves
 * to a Result, so one slow or failing venue never affects the others.
 */

import { VENUE_BASE_URLS, FETCH } from '../core/constants.js';
import { FetchFailureError, LiquidityEngineError, wrapError } from '../core/errors.js';
import { eventBus } from '../core/events.js';
import { createTimer, logVenueFetch } from '../utils/logger.js';
import { createHttpClient, type JsonHttpClient } from './http-client.js';
import { VENUE_ADAPTERS, type VenueAdapter } from './venues/index.js';
import type { OrderBook, Result, VenueName } from '../core/types.js';

export type BookResult = Result<OrderBook, LiquidityEngineError>;

export type HttpClientFactory = (venue: VenueName, timeoutMs: number) => JsonHttpClient;

export interface FetchOptions {
  timeoutMs?: number;
  baseUrls?: Partial<Record<VenueName, string>>;
  adapters?: Partial<Record<VenueName, VenueAdapter>>;
  clientFactory?: HttpClientFactory;
}

const defaultClientFactory: HttpClientFactory = (venue, timeoutMs) => createHttpClient(venue, { timeoutMs });

/**
 * Fetch and normalize books for every venue. Results keep the venue order given.
 */
export async function fetchAllBooks(
  instrument: string,
  venues: readonly VenueName[],
  options: FetchOptions = {}
): Promise<Map<VenueName, BookResult>> {
  const unique = [...new Set(venues)];
  const results = await Promise.all(
    unique.map(async venue => [venue, await fetchVenueBook(venue, instrument, options)] as const)
  );
  return new Map(results);
}

/**
 * Fetch one venue under its own deadline. Never rejects.
 */
export async function fetchVenueBook(
  venue: VenueName,
  instrument: string,
  options: FetchOptions = {}
): Promise<BookResult> {
  const timeoutMs = options.timeoutMs ?? FETCH.DEFAULT_TIMEOUT_MS;
  const adapter = options.adapters?.[venue] ?? VENUE_ADAPTERS[venue];
  const http = (options.clientFactory ?? defaultClientFactory)(venue, timeoutMs);
  const baseUrl = options.baseUrls?.[venue] ?? VENUE_BASE_URLS[venue];

  const stopTimer = createTimer(`fetch ${venue} ${instrument}`);
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the race settles as TIMEOUT
      reject(new FetchFailureError(venue, 'TIMEOUT', `no response within ${timeoutMs} ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    const raw = await Promise.race([
      adapter.fetchRaw({ http, instrument, baseUrl, signal: controller.signal }),
      deadline,
    ]);
    const book = adapter.normalizer.parse(raw);
    const durationMs = Math.round(stopTimer());

    logVenueFetch('FETCHED', venue, {
      instrument,
      durationMs,
      bidLevels: book.bids.length,
      askLevels: book.asks.length,
    });
    eventBus.emit('BOOK_FETCHED', {
      venue,
      instrument,
      durationMs,
      bidLevels: book.bids.length,
      askLevels: book.asks.length,
    });

    return { ok: true, value: book };
  } catch (error) {
    const failure = toVenueError(venue, error);
    const durationMs = Math.round(stopTimer());

    logVenueFetch('FAILED', venue, { instrument, durationMs, code: failure.code, error: failure.message });
    eventBus.emit('VENUE_FAILED', {
      venue,
      instrument,
      code: failure.code,
      error: failure.message,
      durationMs,
    });

    return { ok: false, error: failure };
  } finally {
    clearTimeout(timer);
  }
}

function toVenueError(venue: VenueName, error: unknown): LiquidityEngineError {
  if (error instanceof LiquidityEngineError) {
    return error;
  }
  if (error instanceof Error) {
    return new FetchFailureError(venue, 'NETWORK', error.message);
  }
  return wrapError(error, `Unknown failure fetching ${venue}`);
}
