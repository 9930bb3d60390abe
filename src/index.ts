#!/usr/bin/env node

/**
 * crabfetch CLI
 *
 * Prints host information next to a crab, then exits.
 */

import { Command } from 'commander';

import { runFetch } from './cli/fetch.js';
import { flagOverrides, loadEnvFiles, loadFetchOptions, type CliFlags } from './core/config.js';
import { collectSystemFacts } from './core/facts.js';
import { createLogger } from './core/logger.js';
import { THEME_NAMES } from './core/themes.js';
import { createRasterSupport } from './tui/fetch-render-raster.js';
import { StreamTerminal } from './tui/fetch-render-terminal.js';

// .env.local takes precedence over .env; real environment variables win over both
const envProblems = loadEnvFiles(process.cwd());

// A closed pipe (`crabfetch | head -1`) leaves nothing to print to
process.stdout.on('error', (error: Error) => {
  if ('code' in error && error.code === 'EPIPE') {
    process.exit(0);
  }
  console.error(`Error: ${error.message}`);
  process.exit(1);
});

const program = new Command();

program
  .name('crabfetch')
  .description('A cute system information tool, featuring a crab')
  .version('0.1.0')
  .option('-t, --theme <name>', `Color theme to use (${THEME_NAMES.join(', ')}) (default: "rust")`)
  .option('--no-color', 'Disable colored output')
  .option('-m, --minimal', 'Show minimal info only')
  .option('--no-art', 'Hide the crab')
  .option('--debug', 'Log rendering decisions to stderr')
  .action(async (flags: CliFlags) => {
    const { options, logger } = await loadFetchOptions(flagOverrides(flags), process.env, (debug) =>
      createLogger(debug)
    );
    for (const problem of envProblems) logger(problem);

    const result = await runFetch(options, {
      facts: collectSystemFacts(),
      terminal: new StreamTerminal(process.stdout),
      raster: createRasterSupport(process.stdout),
      logger,
    });
    logger(`Rendered ${result.rows} rows via ${result.path} path`);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : error}`);
  process.exit(1);
});
