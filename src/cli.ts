#!/usr/bin/env node

import { createLineSheetOrchestrator, type LineSheetOrchestrator } from './scraper/scraper-orchestrator.js';
import { ConfigError, loadConfig } from './utils/config.js';
import { logger, setLogLevel } from './utils/logger.js';
import { flushErrors } from './utils/sentry.js';
import type { ScrapeOptions } from './types/index.js';

/**
 * CLI command to scrape rep firm websites into a line sheet
 *
 * Usage:
 *   rep-firm-scraper https://acme-rep.com/
 *   rep-firm-scraper https://acme-rep.com/ --firm-name="Acme Rep" --output=acme.csv
 *   rep-firm-scraper https://a.com/ https://b.com/ --max-depth=1 --max-links=25
 */

const USAGE =
  'Usage: rep-firm-scraper <url> [<url> ...] [--firm-name=<name>] [--output=<file>] [--max-depth=<n>] [--max-links=<n>]';

interface CliArgs {
  urls: string[];
  options: ScrapeOptions;
}

function readFlag(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
}

function readInteger(args: string[], name: string): number | undefined {
  const raw = readFlag(args, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`--${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function parseCliArgs(args: string[]): CliArgs {
  return {
    urls: args.filter((arg) => !arg.startsWith('--')),
    options: {
      repFirmName: readFlag(args, 'firm-name') || undefined,
      outputFilename: readFlag(args, 'output') || undefined,
      maxDepth: readInteger(args, 'max-depth'),
      maxLinksPerPage: readInteger(args, 'max-links'),
    },
  };
}

async function main(): Promise<number> {
  let cliArgs: CliArgs;
  try {
    cliArgs = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 1;
  }

  if (cliArgs.urls.length === 0) {
    console.error(USAGE);
    return 1;
  }

  let orchestrator: LineSheetOrchestrator;
  try {
    const config = loadConfig();
    setLogLevel(config.app.logLevel);
    orchestrator = createLineSheetOrchestrator(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  console.log('=== Rep Firm Line Sheet Scrape ===\n');
  console.log(`  Sites: ${cliArgs.urls.length}`);
  console.log(`  Firm name: ${cliArgs.options.repFirmName || '(derived from each URL)'}`);
  console.log('');

  const result = await orchestrator.run(cliArgs.urls, cliArgs.options);

  console.log('\n=== Results ===\n');
  console.log(`  Records found: ${result.records.length}`);
  console.log(`  Sites succeeded: ${result.sitesSucceeded}/${result.sitesProcessed}`);
  console.log(`  Pages scraped: ${result.pagesScraped}`);
  console.log(`  Errors: ${result.errors.length}`);
  console.log(`  Output: ${result.outputPath}`);

  return 0;
}

main()
  .then(async (code) => {
    await flushErrors();
    process.exit(code);
  })
  .catch(async (error: unknown) => {
    console.error('\n❌ Line sheet scrape failed:', error);
    logger.error('Line sheet scrape failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    await flushErrors();
    process.exit(1);
  });
