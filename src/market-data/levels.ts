/**
 * Shared building blocks for venue normalizers: numeric field parsing,
 * payload validation and level sorting.
 */

import { z } from 'zod';
import { MalformedOrderBookError } from '../core/errors.js';
import { Decimal, parseDecimal } from '../utils/decimal.js';
import type { OrderBook, PriceLevel, RawBookPayload, VenueName } from '../core/types.js';

// ============================================================================
// FIELD SCHEMAS
// ============================================================================

/**
 * Price or size as sent by venues: a decimal string or a JSON number.
 * Strings are parsed straight into Decimal, never through a float.
 */
export const numericField = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = parseDecimal(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${JSON.stringify(value)}` });
    return z.NEVER;
  }
  if (parsed.isNegative()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `negative value: ${parsed.toString()}` });
    return z.NEVER;
  }
  return parsed;
});

// ============================================================================
// PAYLOAD VALIDATION
// ============================================================================

/**
 * Validate a venue payload, raising MalformedOrderBookError on the first issue
 */
export function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: RawBookPayload): T {
  const result = schema.safeParse(raw.data);
  if (!result.success) {
    throw new MalformedOrderBookError(raw.venue, raw.instrument, describeIssues(result.error));
  }
  return result.data;
}

function describeIssues(error: z.ZodError): string {
  const [first] = error.issues;
  if (!first) return 'invalid payload';
  const path = first.path.length ? first.path.join('.') : '<root>';
  const more = error.issues.length > 1 ? ` (+${error.issues.length - 1} more)` : '';
  return `${path}: ${first.message}${more}`;
}

// ============================================================================
// LEVEL HANDLING
// ============================================================================

export function level(price: Decimal, quantity: Decimal): PriceLevel {
  return { price, quantity };
}

/**
 * Drop levels that cannot be traded against (zero price or size)
 */
export function usableLevels(levels: PriceLevel[]): PriceLevel[] {
  return levels.filter(l => l.price.greaterThan(0) && l.quantity.greaterThan(0));
}

/**
 * Bids sorted high to low. Does not mutate the input.
 */
export function sortBids(levels: PriceLevel[]): PriceLevel[] {
  return [...levels].sort((a, b) => b.price.comparedTo(a.price));
}

/**
 * Asks sorted low to high. Does not mutate the input.
 */
export function sortAsks(levels: PriceLevel[]): PriceLevel[] {
  return [...levels].sort((a, b) => a.price.comparedTo(b.price));
}

/**
 * Assemble the canonical book. Both sides must keep at least one usable level.
 */
export function buildOrderBook(
  raw: RawBookPayload,
  bids: PriceLevel[],
  asks: PriceLevel[],
  extras: Pick<OrderBook, 'rpi'> = {}
): OrderBook {
  const usableBids = usableLevels(bids);
  const usableAsks = usableLevels(asks);

  if (usableBids.length === 0) {
    throw new MalformedOrderBookError(raw.venue, raw.instrument, 'no usable bid levels');
  }
  if (usableAsks.length === 0) {
    throw new MalformedOrderBookError(raw.venue, raw.instrument, 'no usable ask levels');
  }

  return {
    exchange: raw.venue,
    instrument: raw.instrument,
    bids: sortBids(usableBids),
    asks: sortAsks(usableAsks),
    receivedAt: raw.receivedAt,
    ...extras,
  };
}

/**
 * Tag a venue response with where and when it came from
 */
export function tagPayload(venue: VenueName, instrument: string, data: unknown): RawBookPayload {
  return { venue, instrument, receivedAt: new Date(), data };
}
