/**
 * Venue adapter registry
 */

import { UnknownVenueError } from '../../core/errors.js';
import { isVenueName } from '../../core/constants.js';
import { extendedAdapter } from './extended.js';
import { hyperliquidAdapter } from './hyperliquid.js';
import { lighterAdapter } from './lighter.js';
import { pacificaAdapter } from './pacifica.js';
import { paradexAdapter } from './paradex.js';
import type { VenueAdapter } from './adapter.js';
import type { VenueName } from '../../core/types.js';

export const VENUE_ADAPTERS: Record<VenueName, VenueAdapter> = {
  Extended: extendedAdapter,
  Hyperliquid: hyperliquidAdapter,
  Lighter: lighterAdapter,
  Pacifica: pacificaAdapter,
  Paradex: paradexAdapter,
};

export function getVenueAdapter(venue: string): VenueAdapter {
  if (!isVenueName(venue)) {
    throw new UnknownVenueError(venue);
  }
  return VENUE_ADAPTERS[venue];
}

export type { Normalizer, VenueAdapter, VenueFetchRequest } from './adapter.js';
export { extendedAdapter, hyperliquidAdapter, lighterAdapter, pacificaAdapter, paradexAdapter };
