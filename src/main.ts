#!/usr/bin/env node
import 'dotenv/config';
import chalk from 'chalk';
import { runCLI } from './cli/index.js';
import { loadConfig } from './config/index.js';
import { startApiServer } from './api/server.js';

async function main(): Promise<void> {
  // Bare invocation with API_ENABLED runs as a service
  if (process.argv.length <= 2 && loadConfig().api.enabled) {
    startApiServer();
    return;
  }
  await runCLI(process.argv);
}

main().catch((error: unknown) => {
  console.error(chalk.red('Fatal:'), error);
  process.exitCode = 1;
});
