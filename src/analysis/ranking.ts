/**
 * Ranking Aggregator
 *
 * Pivots per-venue analyses into one ranked table per clip size.
 */

import { MEDALS, NOTES } from '../core/constants.js';
import { formatNullable } from '../utils/decimal.js';
import type { RankingRow, RankingTable, VenueAnalysis } from '../core/types.js';

type UnrankedRow = Omit<RankingRow, 'rank' | 'medal'>;

/**
 * Rank venues at every clip size any analysis covers (sizes ascending).
 *
 * Reliable rows (fully filled, uncrossed, with a cost) come first by
 * ascending total cost; the rest follow with a note explaining why.
 * Ties are broken by exchange name. Only reliable rows earn a medal.
 */
export function rankBySize(analyses: readonly VenueAnalysis[]): Map<number, RankingTable> {
  const sizes = new Set<number>();
  for (const analysis of analyses) {
    for (const size of analysis.slippageBySize.keys()) {
      sizes.add(size);
    }
  }

  const tables = new Map<number, RankingTable>();
  for (const size of [...sizes].sort((a, b) => a - b)) {
    const rows: UnrankedRow[] = [];
    for (const analysis of analyses) {
      const entry = analysis.slippageBySize.get(size);
      if (!entry) continue;

      rows.push({
        exchange: analysis.exchange,
        slippageBps: entry.avgSlippageBps,
        takerFeeBps: entry.takerFeeBps,
        totalCostBps: entry.totalCostBps,
        filled: entry.filled,
        crossed: analysis.crossed,
        note: rowNote(entry.filled, analysis.crossed),
      });
    }

    tables.set(size, {
      notionalUsd: size,
      label: formatClipSize(size),
      rows: rows.sort(compareRows).map((row, index) => ({
        rank: index + 1,
        medal: isReliable(row) ? MEDALS[index + 1] ?? '' : '',
        ...row,
      })),
    });
  }

  return tables;
}

function isReliable(row: UnrankedRow): boolean {
  return row.filled && !row.crossed && row.totalCostBps !== null;
}

function compareRows(a: UnrankedRow, b: UnrankedRow): number {
  const reliability = Number(isReliable(b)) - Number(isReliable(a));
  if (reliability !== 0) return reliability;

  if (a.totalCostBps !== null && b.totalCostBps !== null) {
    const cost = a.totalCostBps.comparedTo(b.totalCostBps);
    if (cost !== 0) return cost;
  } else if (a.totalCostBps !== null) {
    return -1;
  } else if (b.totalCostBps !== null) {
    return 1;
  }

  if (a.exchange < b.exchange) return -1;
  if (a.exchange > b.exchange) return 1;
  return 0;
}

function rowNote(filled: boolean, crossed: boolean): string {
  const notes: string[] = [];
  if (!filled) notes.push(NOTES.INSUFFICIENT_LIQUIDITY);
  if (crossed) notes.push(NOTES.CROSSED_BOOK);
  return notes.join(' ');
}

// ============================================================================
// TEXT RENDERING
// ============================================================================

/**
 * "12.34 bps (slippage 8.34 + fee 4.00)"
 */
export function formatCostBreakdown(row: RankingRow): string {
  return (
    `${formatNullable(row.totalCostBps)} bps ` +
    `(slippage ${formatNullable(row.slippageBps)} + fee ${row.takerFeeBps.toFixed(2)})`
  );
}

/**
 * Compact monospaced rendering, one line per venue
 */
export function renderRankingsText(table: RankingTable): string {
  return table.rows
    .map(row => {
      const medal = row.medal || '  ';
      const note = row.note ? ` ${row.note}` : '';
      return `${medal} #${String(row.rank).padEnd(2)} ${row.exchange.padEnd(15)} ${formatCostBreakdown(row)}${note}`;
    })
    .join('\n');
}

/**
 * Short USD label for a clip size: $750, $1k, $2.5k, $1M, $2.5M
 */
export function formatClipSize(usd: number): string {
  if (usd >= 1_000_000) return `$${trimNumber(usd / 1_000_000)}M`;
  if (usd >= 1_000) return `$${trimNumber(usd / 1_000)}k`;
  return `$${trimNumber(usd)}`;
}

function trimNumber(value: number): string {
  return String(Number(value.toFixed(2)));
}
