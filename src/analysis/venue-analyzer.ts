/**
 * Venue Analyzer
 *
 * Runs buy and sell fills for every clip size on one venue's book and
 * combines them with the venue's taker fee into a total execution cost.
 */

import { InvalidNotionalError, NoLiquidityError } from '../core/errors.js';
import { getBookTop, simulateFill } from '../execution/slippage.js';
import { analysisLogger } from '../utils/logger.js';
import { Decimal, averageAvailable, decimalMin } from '../utils/decimal.js';
import type {
  FillResult,
  OrderBook,
  Result,
  SizeAnalysis,
  TakerFeeTable,
  VenueAnalysis,
} from '../core/types.js';

export type VenueAnalysisResult = Result<VenueAnalysis, NoLiquidityError>;

// ============================================================================
// FEES
// ============================================================================

/**
 * Taker fee for an exchange, matched case-insensitively. Undefined when absent.
 */
export function lookupTakerFee(table: TakerFeeTable, exchange: string): number | undefined {
  const wanted = exchange.toLowerCase();
  const match = Object.entries(table).find(([name]) => name.toLowerCase() === wanted);
  return match?.[1].bps;
}

// ============================================================================
// ANALYSIS
// ============================================================================

/**
 * Analyze one book at every notional size.
 *
 * A book with an empty side comes back as a `NoLiquidityError` result.
 *
 * @param takerFeeBps - venue taker fee; when omitted 0 is used and the
 *   analysis is marked `takerFeeKnown: false`
 * @throws InvalidNotionalError for a non-positive or non-finite size
 */
export function analyzeVenue(
  orderBook: OrderBook,
  notionalSizes: readonly number[],
  takerFeeBps?: number
): VenueAnalysisResult {
  const { exchange, instrument } = orderBook;

  if (orderBook.bids.length === 0) {
    return emptySide(orderBook, 'bids');
  }
  const top = getBookTop(orderBook);
  if (!top) {
    return emptySide(orderBook, 'asks');
  }

  const sizes = normalizeSizes(notionalSizes);

  const takerFeeKnown = takerFeeBps !== undefined;
  if (!takerFeeKnown) {
    analysisLogger.warn('Taker fee unknown, assuming 0 bps', { exchange });
  }
  const fee = new Decimal(takerFeeBps ?? 0);

  if (top.crossed) {
    analysisLogger.warn('Crossed book', {
      exchange,
      instrument,
      bestBid: top.bestBid.toString(),
      bestAsk: top.bestAsk.toString(),
    });
  }

  const slippageBySize = new Map<number, SizeAnalysis>();
  for (const size of sizes) {
    slippageBySize.set(size, analyzeSize(orderBook, size, fee));
  }

  const analysis: VenueAnalysis = {
    exchange,
    instrument,
    bestBid: top.bestBid,
    bestAsk: top.bestAsk,
    midPrice: top.midPrice,
    spreadBps: top.spreadBps,
    crossed: top.crossed,
    takerFeeBps: fee,
    takerFeeKnown,
    rpi: orderBook.rpi ?? null,
    slippageBySize,
  };
  return { ok: true, value: analysis };
}

function emptySide(book: OrderBook, side: 'bids' | 'asks'): VenueAnalysisResult {
  const error = new NoLiquidityError(book.exchange, book.instrument, side);
  analysisLogger.warn('Empty order book side', { exchange: book.exchange, instrument: book.instrument, side });
  return { ok: false, error };
}

function analyzeSize(book: OrderBook, size: number, fee: Decimal): SizeAnalysis {
  const buy = simulateFill(book, size, 'buy');
  const sell = simulateFill(book, size, 'sell');

  const notes: string[] = [];
  for (const fill of [buy, sell]) {
    if (fill.slippageBps === null) {
      analysisLogger.warn('Slippage unavailable for one side', {
        exchange: book.exchange,
        instrument: book.instrument,
        side: fill.side,
        notionalUsd: size,
        reason: fill.error,
      });
      notes.push(describeMissingSide(fill));
    }
  }

  const avgSlippageBps = averageAvailable([buy.slippageBps, sell.slippageBps]);

  return {
    notionalUsd: size,
    avgSlippageBps,
    takerFeeBps: fee,
    totalCostBps: avgSlippageBps === null ? null : avgSlippageBps.plus(fee),
    effectiveSpreadBps: averageAvailable([buy.effectiveSpreadBps, sell.effectiveSpreadBps]),
    filled: buy.filled && sell.filled,
    filledPercent: decimalMin(buy.filledPercent, sell.filledPercent),
    levelsUsed: { buy: buy.levelsUsed, sell: sell.levelsUsed },
    depthUsed: { buy: buy.depthUsedNotional, sell: sell.depthUsedNotional },
    buy,
    sell,
    notes,
  };
}

function describeMissingSide(fill: FillResult): string {
  return `${fill.side} side unavailable: ${fill.error ?? 'unknown'}`;
}

/**
 * Ascending, de-duplicated sizes. Every size must be positive and finite.
 */
function normalizeSizes(sizes: readonly number[]): number[] {
  for (const size of sizes) {
    if (!Number.isFinite(size) || size <= 0) {
      throw new InvalidNotionalError(String(size));
    }
  }
  return [...new Set(sizes)].sort((a, b) => a - b);
}
