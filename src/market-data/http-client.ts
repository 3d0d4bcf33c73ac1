/**
 * HTTP Client for venue order book endpoints
 *
 * Thin axios wrapper. Every venue fetcher goes through JsonHttpClient so
 * HTTP, timeout and transport failures are classified the same way.
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import { FETCH } from '../core/constants.js';
import { FetchFailureError } from '../core/errors.js';

// ============================================================================
// CLIENT INTERFACE
// ============================================================================

export interface JsonRequestOptions {
  params?: Record<string, string | number>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Minimal JSON client the venue fetchers depend on
 */
export interface JsonHttpClient {
  getJson(url: string, options?: JsonRequestOptions): Promise<unknown>;
  postJson(url: string, body: unknown, options?: JsonRequestOptions): Promise<unknown>;
}

export interface HttpClientOptions {
  timeoutMs?: number;
}

// ============================================================================
// AXIOS IMPLEMENTATION
// ============================================================================

export class AxiosJsonClient implements JsonHttpClient {
  private readonly http: AxiosInstance;

  constructor(private readonly venue: string, options: HttpClientOptions = {}) {
    this.http = axios.create({
      timeout: options.timeoutMs ?? FETCH.DEFAULT_TIMEOUT_MS,
      headers: {
        Accept: 'application/json',
        'User-Agent': FETCH.USER_AGENT,
      },
    });
  }

  async getJson(url: string, options: JsonRequestOptions = {}): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(url, {
        params: options.params,
        headers: options.headers,
        signal: options.signal,
      });
      return response.data;
    } catch (error) {
      throw classifyHttpError(this.venue, url, error);
    }
  }

  async postJson(url: string, body: unknown, options: JsonRequestOptions = {}): Promise<unknown> {
    try {
      const response = await this.http.post<unknown>(url, body, {
        params: options.params,
        headers: { 'Content-Type': 'application/json', ...options.headers },
        signal: options.signal,
      });
      return response.data;
    } catch (error) {
      throw classifyHttpError(this.venue, url, error);
    }
  }
}

/**
 * Create a JSON client for one venue
 */
export function createHttpClient(venue: string, options: HttpClientOptions = {}): JsonHttpClient {
  return new AxiosJsonClient(venue, options);
}

// ============================================================================
// ERROR CLASSIFICATION
// ============================================================================

/**
 * Map an axios (or unknown) error onto FetchFailureError
 */
export function classifyHttpError(venue: string, url: string, error: unknown): FetchFailureError {
  if (error instanceof FetchFailureError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      return new FetchFailureError(venue, 'HTTP', `HTTP ${status} for ${url}: ${describeBody(error.response?.data)}`, {
        status,
        url,
      });
    }
    if (
      error.code === AxiosError.ECONNABORTED ||
      error.code === AxiosError.ETIMEDOUT ||
      error.code === AxiosError.ERR_CANCELED
    ) {
      return new FetchFailureError(venue, 'TIMEOUT', `request to ${url} timed out or was aborted`, { url });
    }
    return new FetchFailureError(venue, 'NETWORK', error.message, { url, axiosCode: error.code });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new FetchFailureError(venue, 'NETWORK', message, { url });
}

function describeBody(data: unknown): string {
  if (data === undefined || data === null) return '<empty>';
  const text = typeof data === 'string' ? data : JSON.stringify(data);
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}
