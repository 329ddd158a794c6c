#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { DEFAULT_CACHE_DB, HttpCache } from './core/cache.js';
import { loadConfig } from './core/config.js';
import { createRunContext, type RunContext } from './core/context.js';
import { PipelineError } from './core/errors.js';
import { createConsoleLogger } from './core/logger.js';
import { loadMarketFlows } from './core/market-flows.js';
import { runPipeline } from './core/pipeline.js';
import { resolveTicker } from './core/resolver.js';
import { inferFilingMeta, parseForm4Xml } from './processing/form4-parser.js';
import { renderCompanies, renderRunSummary, renderTransactions } from './output/run-renderer.js';
import type { Company, LineFailure, Transaction } from './core/types.js';

interface CollectOptions {
  filings?: string;
  out?: string;
  keepIntermediate?: boolean;
  format: string;
  since?: string;
  maxFailures?: string;
  rps?: string;
  cache: boolean;
  marketFlows?: string;
  json?: boolean;
  verbose?: boolean;
}

interface ParseOptions {
  ticker?: string;
  filingDate?: string;
  json?: boolean;
}

function parseFormats(format: string): string[] {
  return format === 'both' ? ['csv', 'json'] : [format];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function cacheFor(enabled: boolean, cacheDb: string | null): HttpCache | null {
  return enabled ? new HttpCache(cacheDb ?? DEFAULT_CACHE_DB) : null;
}

async function executeCollect(tickers: string[], options: CollectOptions): Promise<void> {
  let ctx: RunContext | null = null;
  try {
    const config = loadConfig({
      filingsPerTicker: options.filings,
      outputDir: options.out,
      keepIntermediate: options.keepIntermediate,
      formats: parseFormats(options.format),
      sinceDays: options.since,
      maxConsecutiveFailures: options.maxFailures,
      requestsPerSecond: options.rps,
    });
    const logger = createConsoleLogger({ verbose: options.verbose, quiet: options.json });
    const marketFlows = options.marketFlows ? await loadMarketFlows(options.marketFlows) : [];

    ctx = createRunContext(config, { logger, cache: cacheFor(options.cache, config.cacheDb) });
    const report = await runPipeline(ctx, { tickers, marketFlows });

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log('');
      console.log(renderRunSummary(report));
      console.log('');
    }

    if (report.status === 'failure') process.exitCode = 1;
  } catch (err) {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    process.exitCode = 1;
  } finally {
    ctx?.cache?.close();
  }
}

async function executeResolve(tickers: string[], options: { json?: boolean }): Promise<void> {
  let ctx: RunContext | null = null;
  try {
    const config = loadConfig();
    ctx = createRunContext(config, {
      logger: createConsoleLogger({ quiet: options.json }),
      cache: cacheFor(true, config.cacheDb),
    });

    const companies: Company[] = [];
    for (const ticker of tickers) {
      try {
        companies.push(await resolveTicker(ctx, ticker));
      } catch (err) {
        if (!(err instanceof PipelineError)) throw err;
        console.error(chalk.red(err.message));
        process.exitCode = 1;
      }
    }

    console.log(options.json ? JSON.stringify(companies, null, 2) : renderCompanies(companies));
  } catch (err) {
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    process.exitCode = 1;
  } finally {
    ctx?.cache?.close();
  }
}

async function executeParse(files: string[], options: ParseOptions): Promise<void> {
  const transactions: Transaction[] = [];
  const lineFailures: LineFailure[] = [];
  const today = new Date().toISOString().slice(0, 10);

  for (const file of files) {
    try {
      const body = await readFile(file, 'utf8');
      const inferred = inferFilingMeta(body, {
        ticker: 'UNKNOWN',
        accessionNumber: basename(file, extname(file)),
        filingDate: today,
      });
      const result = parseForm4Xml(body, {
        ...inferred,
        ticker: options.ticker?.toUpperCase() ?? inferred.ticker,
        filingDate: options.filingDate ?? inferred.filingDate,
      });
      transactions.push(...result.transactions);
      lineFailures.push(...result.lineFailures);
    } catch (err) {
      console.error(chalk.red(`${file}: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  }

  if (options.json) {
    console.log(JSON.stringify({ transactions, line_failures: lineFailures }, null, 2));
  } else {
    console.log('');
    console.log(renderTransactions(transactions, lineFailures));
    console.log('');
  }
}

const program = new Command();

program
  .name('form4-flow')
  .description('Collect SEC Form 4 insider transactions and aggregate them into flow reports')
  .version('0.1.0');

program
  .command('collect')
  .alias('run')
  .description('Fetch, parse and aggregate recent Form 4 filings for one or more tickers')
  .argument('<tickers...>', 'Stock tickers (e.g., AAPL MSFT)')
  .option('-n, --filings <n>', 'Form 4 filings to collect per ticker')
  .option('-o, --out <dir>', 'Output directory')
  .option('-k, --keep-intermediate', 'Keep staged filings and the transaction list')
  .option('-f, --format <format>', 'Report format: csv, json or both', 'both')
  .option('--since <days>', 'Only filings from the last N days')
  .option('--max-failures <n>', 'Skip remaining tickers after N consecutive failures')
  .option('--rps <n>', 'Requests per second (max 10)')
  .option('--no-cache', 'Bypass the local response cache')
  .option('--market-flows <file>', 'JSON file of market fund-flow rows to include in the report')
  .option('-j, --json', 'Print the run report as JSON')
  .option('-v, --verbose', 'Show debug output')
  .action(async (tickers: string[], options: CollectOptions) => {
    await executeCollect(tickers, options);
  });

program
  .command('resolve')
  .description('Look up the CIK for one or more tickers')
  .argument('<tickers...>', 'Stock tickers')
  .option('-j, --json', 'Output as JSON')
  .action(async (tickers: string[], options: { json?: boolean }) => {
    await executeResolve(tickers, options);
  });

program
  .command('parse')
  .description('Parse Form 4 documents from local files (no network)')
  .argument('<files...>', 'Form 4 XML or full submission text files')
  .option('-t, --ticker <ticker>', 'Ticker to attribute transactions to')
  .option('--filing-date <date>', 'Filing date (YYYY-MM-DD) when the file has no header')
  .option('-j, --json', 'Output as JSON')
  .action(async (files: string[], options: ParseOptions) => {
    await executeParse(files, options);
  });

program
  .command('cache')
  .description('Manage the local response cache')
  .option('--clear', 'Clear all cached data')
  .option('--stats', 'Show cache statistics')
  .action((options: { clear?: boolean; stats?: boolean }) => {
    let cache: HttpCache | null = null;
    try {
      cache = new HttpCache(loadConfig().cacheDb ?? DEFAULT_CACHE_DB);
      if (options.clear) {
        cache.clear();
        console.log(chalk.green('Cache cleared.'));
        return;
      }
      const stats = cache.stats();
      const sizeMb = (stats.sizeBytes / 1024 / 1024).toFixed(1);
      if (options.stats) {
        console.log(`\n  Cache entries: ${stats.entries}`);
        console.log(`  Cache size:    ${sizeMb} MB`);
        console.log(`  Location:      ${stats.location}\n`);
      } else {
        console.log(`\n  Cache: ${stats.entries} entries, ${sizeMb} MB`);
        console.log(`  Use --clear to reset, --stats for details\n`);
      }
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 1;
    } finally {
      cache?.close();
    }
  });

await program.parseAsync();
