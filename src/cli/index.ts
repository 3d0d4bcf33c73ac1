/**
 * CLI Interface for the Perp Liquidity Analyzer
 */

import { Command } from 'commander';
import inquirer from 'inquirer';
import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { defaultConfigFile, loadConfig } from '../config/index.js';
import { VENUES } from '../core/constants.js';
import { InvalidConfigError, wrapError } from '../core/errors.js';
import { enableEventLogging, withEventHandler } from '../core/events.js';
import { analyzeLiquidity } from '../analysis/liquidity-service.js';
import { toReportRecord } from '../analysis/tables.js';
import { startApiServer } from '../api/server.js';
import { logger, setLogLevel } from '../utils/logger.js';
import {
  ASSUMPTIONS,
  renderDetailedTable,
  renderFeeTable,
  renderRankings,
  renderRpiTable,
  renderVenueTable,
} from './render.js';
import type { SystemConfig, VenueName } from '../core/types.js';

interface AnalyzeCommandOptions {
  venues?: string;
  sizes?: string;
  timeout?: string;
  json?: boolean;
  detailed?: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name('perp-liquidity')
  .description('Compare execution cost across perpetuals venues from live order books')
  .version('1.0.0');

program
  .command('analyze')
  .description('Fetch order books and rank venues by total execution cost')
  .argument('[instrument]', 'instrument symbol, e.g. BTC')
  .option('--venues <list>', `comma-separated venues (${VENUES.join(', ')})`)
  .option('--sizes <list>', 'comma-separated clip sizes in USD')
  .option('--timeout <ms>', 'per-venue fetch timeout in milliseconds')
  .option('--json', 'print the report as JSON')
  .option('--detailed', 'include the detailed breakdown per clip size')
  .option('--verbose', 'log every engine event')
  .action(async (instrumentArg: string | undefined, options: AnalyzeCommandOptions) => {
    try {
      const config = loadConfig();
      if (options.verbose) setLogLevel('debug');
      const stopEventLog = options.verbose ? enableEventLogging(msg => logger.debug(msg)) : undefined;

      const instrument = instrumentArg ?? (await promptInstrument(config));
      const run = () =>
        analyzeLiquidity(instrument, {
          config,
          venues: parseVenues(options.venues),
          clipSizes: parseSizes(options.sizes),
          timeoutMs: options.timeout === undefined ? undefined : parseTimeout(options.timeout),
        });

      if (options.json) {
        const report = await run();
        stopEventLog?.();
        console.log(JSON.stringify(toReportRecord(report), null, 2));
        return;
      }

      console.log(chalk.cyan(`Fetching order books for ${instrument.toUpperCase()}...`));
      const report = await withEventHandler(
        'BOOK_FETCHED',
        event => {
          const { venue, durationMs, bidLevels, askLevels } = event.payload;
          console.log(chalk.green(`  ✓ ${venue.padEnd(12)} ${bidLevels} bids / ${askLevels} asks (${durationMs} ms)`));
        },
        () =>
          withEventHandler(
            'VENUE_FAILED',
            event => {
              const { venue, error } = event.payload;
              console.log(chalk.red(`  ✗ ${venue.padEnd(12)} ${error}`));
            },
            run
          )
      );
      stopEventLog?.();

      console.log('');
      console.log(renderRankings(report));
      console.log('');
      console.log(renderVenueTable(report));

      if (options.detailed) {
        console.log(chalk.bold('\nDetailed Breakdown'));
        for (const table of report.rankings.values()) {
          console.log(renderDetailedTable(table));
        }
      }

      const rpi = renderRpiTable(report);
      if (rpi) {
        console.log(chalk.bold('\nRetail Price Improvement'));
        console.log(rpi);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command('fees')
  .description('Show the taker fee table and analysis assumptions')
  .action(() => {
    try {
      const config = loadConfig();
      console.log(chalk.bold('Assumptions'));
      for (const line of ASSUMPTIONS) console.log(`- ${line}`);
      console.log('');
      console.log(renderFeeTable(config.fees.takerFeesBps));
    } catch (error) {
      fail(error);
    }
  });

program
  .command('serve')
  .description('Start the HTTP API')
  .option('--port <port>', 'port to listen on')
  .action((options: { port?: string }) => {
    try {
      const config = loadConfig();
      startApiServer({ config, port: options.port === undefined ? undefined : parsePort(options.port) });
    } catch (error) {
      fail(error);
    }
  });

program
  .command('init')
  .description('Write a default config file')
  .option('--path <path>', 'config file location', './config/default.json')
  .option('--force', 'overwrite an existing file')
  .action((options: { path: string; force?: boolean }) => {
    if (existsSync(options.path) && !options.force) {
      console.log(chalk.yellow(`${options.path} already exists (use --force to overwrite)`));
      return;
    }
    mkdirSync(dirname(options.path), { recursive: true });
    writeFileSync(options.path, `${defaultConfigFile}\n`);
    console.log(chalk.green(`✓ Wrote ${options.path}`));
  });

// ============================================================================
// HELPERS
// ============================================================================

async function promptInstrument(config: SystemConfig): Promise<string> {
  if (!process.stdin.isTTY) {
    return config.analysis.defaultInstrument;
  }
  const { instrument } = await inquirer.prompt<{ instrument: string }>([
    {
      type: 'list',
      name: 'instrument',
      message: 'Select instrument:',
      choices: config.analysis.instruments,
      default: config.analysis.defaultInstrument,
    },
  ]);
  return instrument;
}

/**
 * "hyperliquid,Paradex" -> ['Hyperliquid', 'Paradex']
 */
export function parseVenues(value: string | undefined): VenueName[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map(s => s.trim())
    .filter(Boolean)
    .map(name => {
      const match = VENUES.find(venue => venue.toLowerCase() === name.toLowerCase());
      if (!match) {
        throw new InvalidConfigError('--venues', name, `expected one of ${VENUES.join(', ')}`);
      }
      return match;
    });
}

/**
 * "1000,10_000,1e6" -> [1000, 10000, 1000000]
 */
export function parseSizes(value: string | undefined): number[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map(s => s.trim())
    .filter(Boolean)
    .map(raw => {
      const size = Number(raw.replace(/_/g, ''));
      if (!Number.isFinite(size) || size <= 0) {
        throw new InvalidConfigError('--sizes', raw, 'expected a positive USD amount');
      }
      return size;
    });
}

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidConfigError('--timeout', value, 'expected a positive integer');
  }
  return ms;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidConfigError('--port', value, 'expected 1-65535');
  }
  return port;
}

function fail(error: unknown): void {
  const wrapped = wrapError(error);
  console.error(chalk.red(`Error: ${wrapped.message}`));
  logger.debug('Command failed', wrapped.toJSON());
  process.exitCode = 1;
}

export async function runCLI(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv);
}
