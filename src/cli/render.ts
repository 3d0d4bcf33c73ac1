/**
 * Terminal rendering for CLI output
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import { renderRankingsText } from '../analysis/ranking.js';
import { toDetailedRecords, toFeeRecords, toRpiRecords, toVenueRecords } from '../analysis/tables.js';
import { lastUpdatedCaption } from '../utils/date.js';
import type { LiquidityReport, RankingTable, TableCell, TakerFeeTable } from '../core/types.js';

export const ASSUMPTIONS = [
  'Full clip size can be taken against the current book; market makers may react to taker orders in practice.',
  'Slippage is the average of the buy-side and sell-side walks.',
];

function cell(value: TableCell): string {
  if (value === null) return chalk.gray('n/a');
  if (typeof value === 'number') return value.toFixed(2);
  return String(value);
}

export function renderRankings(report: LiquidityReport): string {
  const sections: string[] = [chalk.bold(`Slippage Rankings: ${report.instrument}`)];

  for (const table of report.rankings.values()) {
    sections.push(chalk.cyan.bold(table.label));
    sections.push(table.rows.length ? renderRankingsText(table) : chalk.gray('  no venue data'));
  }

  sections.push(chalk.gray(lastUpdatedCaption(report.generatedAt)));
  return sections.join('\n');
}

export function renderVenueTable(report: LiquidityReport): string {
  const table = new Table({
    head: ['Exchange', 'Status', 'Mid', 'Spread (bps)', 'Taker Fee (bps)', 'Crossed', 'Error'],
  });

  for (const record of toVenueRecords(report)) {
    const ok = record['status'] === 'ok';
    table.push([
      cell(record['exchange'] ?? null),
      ok ? chalk.green('ok') : chalk.red('error'),
      record['midPrice'] === null || record['midPrice'] === undefined ? chalk.gray('n/a') : String(record['midPrice']),
      cell(record['spreadBps'] ?? null),
      cell(record['takerFeeBps'] ?? null),
      record['crossed'] === true ? chalk.yellow('yes') : '',
      record['error'] ? chalk.red(String(record['error'])) : '',
    ]);
  }

  return table.toString();
}

export function renderDetailedTable(rankings: RankingTable): string {
  const table = new Table({
    head: ['#', 'Exchange', 'Slippage (bps)', 'Taker Fee (bps)', 'Total Cost (bps)', 'Note'],
  });

  for (const record of toDetailedRecords(rankings)) {
    table.push([
      String(record['rank']),
      cell(record['exchange'] ?? null),
      cell(record['slippageBps'] ?? null),
      cell(record['takerFeeBps'] ?? null),
      cell(record['totalCostBps'] ?? null),
      record['note'] ? chalk.yellow(String(record['note'])) : '',
    ]);
  }

  return `Clip Size: ${chalk.bold(rankings.label)}\n${table.toString()}`;
}

/**
 * RPI vs API top of book. Empty string when no venue publishes RPI quotes.
 */
export function renderRpiTable(report: LiquidityReport): string {
  const records = toRpiRecords(report);
  if (records.length === 0) return '';

  const table = new Table({
    head: ['Exchange', 'API Bid', 'API Ask', 'API Spread (bps)', 'RPI Bid', 'RPI Ask', 'RPI Spread (bps)'],
  });
  for (const record of records) {
    table.push([
      cell(record['exchange'] ?? null),
      String(record['apiBid'] ?? 'n/a'),
      String(record['apiAsk'] ?? 'n/a'),
      cell(record['apiSpreadBps'] ?? null),
      String(record['rpiBid']),
      String(record['rpiAsk']),
      cell(record['rpiSpreadBps'] ?? null),
    ]);
  }
  return table.toString();
}

export function renderFeeTable(fees: TakerFeeTable): string {
  const table = new Table({ head: ['Exchange', 'Taker Fee (bps)', 'Assumption'] });
  for (const record of toFeeRecords(fees)) {
    table.push([String(record['exchange']), String(record['takerFeeBps']), String(record['assumption'] ?? '')]);
  }
  return table.toString();
}
