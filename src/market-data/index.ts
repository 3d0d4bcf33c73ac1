/**
 * Market Data Module
 *
 * Venue fetchers, normalizers and the concurrent fetch orchestrator.
 */

export { normalize } from './normalizer.js';
export { fetchAllBooks, fetchVenueBook } from './orchestrator.js';
export type { BookResult, FetchOptions, HttpClientFactory } from './orchestrator.js';
export { AxiosJsonClient, classifyHttpError, createHttpClient } from './http-client.js';
export type { JsonHttpClient, JsonRequestOptions, HttpClientOptions } from './http-client.js';
export { VENUE_ADAPTERS, getVenueAdapter } from './venues/index.js';
export type { Normalizer, VenueAdapter, VenueFetchRequest } from './venues/index.js';
export { buildOrderBook, numericField, parsePayload, sortAsks, sortBids, tagPayload } from './levels.js';
