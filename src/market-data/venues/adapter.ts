/**
 * Venue adapter contract: one fetcher plus one normalizer per venue.
 * Adding a venue means adding one adapter to the registry.
 */

import type { JsonHttpClient } from '../http-client.js';
import type { OrderBook, RawBookPayload, VenueName } from '../../core/types.js';

export interface VenueFetchRequest {
  http: JsonHttpClient;
  instrument: string;
  baseUrl: string;
  signal?: AbortSignal;
}

/**
 * Converts one venue's wire format into the canonical OrderBook
 */
export interface Normalizer {
  readonly venue: VenueName;
  parse(raw: RawBookPayload): OrderBook;
}

export interface VenueAdapter {
  readonly venue: VenueName;
  readonly normalizer: Normalizer;
  fetchRaw(request: VenueFetchRequest): Promise<RawBookPayload>;
}
