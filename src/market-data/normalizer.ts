/**
 * Order Book Normalizer
 *
 * Dispatches a venue-native payload to that venue's normalizer.
 */

import { getVenueAdapter } from './venues/index.js';
import type { OrderBook, RawBookPayload } from '../core/types.js';

/**
 * Normalize a raw payload into the canonical OrderBook.
 * The exchange name selects the normalizer; unknown names raise UnknownVenueError.
 */
export function normalize(exchangeName: string, raw: RawBookPayload): OrderBook {
  const { normalizer } = getVenueAdapter(exchangeName);
  return normalizer.parse({ ...raw, venue: normalizer.venue });
}
