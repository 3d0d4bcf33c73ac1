/**
 * Slippage Simulator
 *
 * Walks one side of a normalized order book with a market order of a fixed
 * USD notional and reports the resulting fill:
 * - Average fill price against the mid
 * - Slippage in percent and basis points
 * - Effective spread between the first and last level touched
 * - Fill completeness when the book runs out
 */

import { InvalidNotionalError } from '../core/errors.js';
import {
  Decimal,
  HUNDRED,
  TWO,
  ZERO,
  decimalSum,
  parseDecimal,
  toBps,
  type DecimalInput,
} from '../utils/decimal.js';
import type {
  BookTop,
  FillErrorReason,
  FillResult,
  FillSide,
  OrderBook,
  PriceLevel,
} from '../core/types.js';

// ============================================================================
// BOOK HELPERS
// ============================================================================

/**
 * Best prices, mid and quoted spread. Null when either side is empty.
 */
export function getBookTop(book: OrderBook): BookTop | null {
  const [bestBidLevel] = book.bids;
  const [bestAskLevel] = book.asks;
  if (!bestBidLevel || !bestAskLevel) {
    return null;
  }

  const bestBid = bestBidLevel.price;
  const bestAsk = bestAskLevel.price;

  return {
    bestBid,
    bestAsk,
    midPrice: bestBid.plus(bestAsk).dividedBy(TWO),
    spreadBps: toBps(bestAsk.minus(bestBid), bestBid),
    crossed: bestBid.greaterThanOrEqualTo(bestAsk),
  };
}

/**
 * Total USD available on one side (sum of price x quantity)
 */
export function getSideDepthNotional(levels: PriceLevel[]): Decimal {
  return decimalSum(levels.map(l => l.price.times(l.quantity)));
}

// ============================================================================
// FILL SIMULATION
// ============================================================================

/**
 * Simulate a market order of `notionalSizeUsd` on `side`.
 *
 * Buys consume asks from the lowest price, sells consume bids from the
 * highest. The function is pure; calling it twice gives identical results.
 *
 * @throws InvalidNotionalError for a negative or non-finite notional
 */
export function simulateFill(book: OrderBook, notionalSizeUsd: DecimalInput, side: FillSide): FillResult {
  const notional = validateNotional(notionalSizeUsd);
  const levels = side === 'buy' ? book.asks : book.bids;
  const [firstLevel] = levels;

  if (!firstLevel) {
    return unfilled(side, notional, 'No liquidity');
  }

  const top = getBookTop(book);
  if (!top) {
    return unfilled(side, notional, 'No reference price');
  }

  const midPrice = top.midPrice;
  const bestPrice = firstLevel.price;

  if (notional.isZero()) {
    return {
      side,
      notionalUsd: notional,
      ...slippageAgainstMid(side, bestPrice, midPrice),
      effectiveSpreadBps: ZERO,
      filled: true,
      filledPercent: HUNDRED,
      levelsUsed: 0,
      depthUsedNotional: ZERO,
      filledQuantity: ZERO,
      midPrice,
      bestPrice,
      worstPrice: bestPrice,
      avgPrice: bestPrice,
    };
  }

  let remaining = notional;
  let totalQuantity = ZERO;
  let totalCost = ZERO;
  let worstPrice = bestPrice;
  let levelsUsed = 0;

  for (const { price, quantity } of levels) {
    const valueAtLevel = price.times(quantity);
    worstPrice = price;
    levelsUsed++;

    if (remaining.lessThanOrEqualTo(valueAtLevel)) {
      totalQuantity = totalQuantity.plus(remaining.dividedBy(price));
      totalCost = totalCost.plus(remaining);
      remaining = ZERO;
      break;
    }

    totalQuantity = totalQuantity.plus(quantity);
    totalCost = totalCost.plus(valueAtLevel);
    remaining = remaining.minus(valueAtLevel);
  }

  if (totalQuantity.isZero()) {
    return unfilled(side, notional, 'No liquidity', { midPrice, bestPrice });
  }

  const filled = remaining.isZero();
  const avgPrice = totalCost.dividedBy(totalQuantity);

  return {
    side,
    notionalUsd: notional,
    ...slippageAgainstMid(side, avgPrice, midPrice),
    effectiveSpreadBps: toBps(worstPrice.minus(bestPrice).abs(), bestPrice),
    filled,
    filledPercent: filled ? HUNDRED : totalCost.dividedBy(notional).times(HUNDRED),
    levelsUsed,
    depthUsedNotional: totalCost,
    filledQuantity: totalQuantity,
    midPrice,
    bestPrice,
    worstPrice,
    avgPrice,
  };
}

// ============================================================================
// INTERNALS
// ============================================================================

function validateNotional(value: DecimalInput): Decimal {
  const parsed = value instanceof Decimal ? value : parseDecimal(value);
  if (parsed === null || !parsed.isFinite() || parsed.isNegative()) {
    throw new InvalidNotionalError(String(value));
  }
  return parsed;
}

/**
 * Buys pay above mid, sells receive below mid; both come out positive
 */
function slippageAgainstMid(
  side: FillSide,
  avgPrice: Decimal,
  midPrice: Decimal
): Pick<FillResult, 'slippagePercent' | 'slippageBps'> {
  const diff = side === 'buy' ? avgPrice.minus(midPrice) : midPrice.minus(avgPrice);
  const slippagePercent = diff.dividedBy(midPrice).times(HUNDRED);
  return { slippagePercent, slippageBps: slippagePercent.times(HUNDRED) };
}

function unfilled(
  side: FillSide,
  notional: Decimal,
  error: FillErrorReason,
  prices: { midPrice: Decimal | null; bestPrice: Decimal | null } = { midPrice: null, bestPrice: null }
): FillResult {
  return {
    side,
    notionalUsd: notional,
    slippagePercent: null,
    slippageBps: null,
    effectiveSpreadBps: null,
    filled: false,
    filledPercent: ZERO,
    levelsUsed: 0,
    depthUsedNotional: ZERO,
    filledQuantity: ZERO,
    midPrice: prices.midPrice,
    bestPrice: prices.bestPrice,
    worstPrice: null,
    avgPrice: null,
    error,
  };
}
