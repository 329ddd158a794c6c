/**
 * Form 4 collection pipeline.
 *
 * Resolve -> index -> fetch -> parse per ticker, then aggregate across
 * all tickers, write the report and clean up. Returns data and never
 * prints; the CLI decides how to present it.
 *
 * Per-ticker and per-filing failures are collected as tagged outcomes.
 * Only StagingError (and anything else that isn't a PipelineError)
 * aborts the run, and cleanup runs either way.
 */

import { resolve } from 'node:path';
import { PipelineError, UnknownTickerError } from './errors.js';
import { resolveTicker } from './resolver.js';
import { aggregate } from '../processing/aggregator.js';
import { listFilings } from '../processing/filing-index.js';
import { fetchFiling, prepareStaging } from '../processing/filing-fetcher.js';
import { parseFiling } from '../processing/form4-parser.js';
import { writeReports } from '../output/report-writer.js';
import type { ReportContent } from '../output/json-renderer.js';
import type { RunContext } from './context.js';
import type {
  Company,
  FilingRef,
  LineFailure,
  MarketFlowRow,
  Outcome,
  ParseResult,
  ReportFile,
  RunReport,
  RunStatus,
  StageFailure,
  TickerOutcome,
  Transaction,
} from './types.js';

export interface PipelineOptions {
  tickers: string[];
  marketFlows?: readonly MarketFlowRow[];
  now?: () => Date;
}

interface TickerResult {
  outcome: TickerOutcome;
  transactions: Transaction[];
  failures: StageFailure[];
  lineFailures: LineFailure[];
}

export function toFailure(err: PipelineError): StageFailure {
  return {
    kind: err.kind,
    ticker: err.ticker,
    accession_number: err.accessionNumber,
    reason: err.message,
  };
}

/** Uppercased, trimmed, first occurrence wins */
export function uniqueTickers(tickers: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of tickers) {
    const ticker = raw.trim().toUpperCase();
    if (seen.has(ticker)) continue;
    seen.add(ticker);
    result.push(ticker);
  }
  return result;
}

export function runStatus(outcomes: readonly TickerOutcome[], failures: number, lineFailures: number): RunStatus {
  if (outcomes.length > 0 && outcomes.every(o => o.failed)) return 'failure';
  if (failures > 0 || lineFailures > 0) return 'partial';
  return 'success';
}

export async function runPipeline(ctx: RunContext, options: PipelineOptions): Promise<RunReport> {
  const now = options.now ?? (() => new Date());
  const keep = ctx.config.keepIntermediate;

  let written: { content: ReportContent; reports: ReportFile[] };
  try {
    written = await collectAndWrite(ctx, options, now);
  } catch (err) {
    await ctx.artifacts.finalize(keep);
    throw err;
  }
  const cleanup = await ctx.artifacts.finalize(keep);

  const deleted = new Set(cleanup.deleted);
  return {
    ...written.content,
    reports: written.reports.filter(r => !deleted.has(resolve(r.path))),
    cleanup: {
      kept_intermediate: keep,
      deleted: cleanup.deleted.length,
      retained: cleanup.retained.length,
      failures: cleanup.failures,
    },
  };
}

async function collectAndWrite(
  ctx: RunContext,
  options: PipelineOptions,
  now: () => Date
): Promise<{ content: ReportContent; reports: ReportFile[] }> {
  const { config, logger } = ctx;
  const startedAt = now();

  await prepareStaging(ctx);

  const since = config.sinceDays
    ? new Date(startedAt.getTime() - config.sinceDays * 24 * 60 * 60 * 1000).toISOString().slice(0, 10)
    : null;

  const outcomes: TickerOutcome[] = [];
  const failures: StageFailure[] = [];
  const lineFailures: LineFailure[] = [];
  const transactions: Transaction[] = [];
  let consecutiveFailures = 0;
  let breakerOpen = false;

  for (const ticker of uniqueTickers(options.tickers)) {
    if (breakerOpen) {
      failures.push({
        kind: 'Skipped',
        ticker,
        accession_number: null,
        reason: `Skipped after ${consecutiveFailures} consecutive ticker failures`,
      });
      outcomes.push({ ticker, cik: null, filings_listed: 0, filings_parsed: 0, transactions: 0, failed: true });
      continue;
    }

    const result = await collectTicker(ctx, ticker, since);
    outcomes.push(result.outcome);
    failures.push(...result.failures);
    lineFailures.push(...result.lineFailures);
    transactions.push(...result.transactions);

    consecutiveFailures = result.outcome.failed ? consecutiveFailures + 1 : 0;
    if (config.maxConsecutiveFailures !== null && consecutiveFailures >= config.maxConsecutiveFailures) {
      breakerOpen = true;
      logger.warn(`${consecutiveFailures} consecutive tickers failed; skipping the rest`);
    }
  }

  const content: ReportContent = {
    status: runStatus(outcomes, failures.length, lineFailures.length),
    started_at: startedAt.toISOString(),
    finished_at: now().toISOString(),
    tickers: outcomes,
    failures,
    line_failures: lineFailures,
    transactions,
    tables: aggregate(transactions),
  };

  const reports = await writeReports(ctx, content, options.marketFlows);
  return { content, reports };
}

async function collectTicker(ctx: RunContext, ticker: string, since: string | null): Promise<TickerResult> {
  const { logger, config } = ctx;
  const outcome: TickerOutcome = {
    ticker,
    cik: null,
    filings_listed: 0,
    filings_parsed: 0,
    transactions: 0,
    failed: false,
  };
  const result: TickerResult = { outcome, transactions: [], failures: [], lineFailures: [] };

  const fail = (failure: StageFailure): TickerResult => {
    logger.warn(`${failure.ticker || '(blank)'}: ${failure.reason}`);
    result.failures.push(failure);
    outcome.failed = true;
    return result;
  };

  let company: Company;
  try {
    company = await resolveTicker(ctx, ticker);
  } catch (err) {
    if (err instanceof PipelineError) return fail(toFailure(err));
    // Directory unreachable: the ticker can't be mapped this run
    const reason = err instanceof Error ? err.message : String(err);
    return fail({ ...toFailure(new UnknownTickerError(ticker)), reason: `Ticker lookup failed: ${reason}` });
  }
  outcome.cik = company.cik;

  let refs: FilingRef[];
  try {
    refs = await listFilings(ctx, company, config.filingsPerTicker, { since });
  } catch (err) {
    if (err instanceof PipelineError) return fail(toFailure(err));
    throw err;
  }
  outcome.filings_listed = refs.length;
  logger.info(`${ticker}: ${refs.length} Form 4 filing(s)`);

  // Fetch in batches; the shared limiter still spaces the requests
  for (let batch = 0; batch < refs.length; batch += config.fetchConcurrency) {
    const batchRefs = refs.slice(batch, batch + config.fetchConcurrency);
    const outcomes = await settleBatch(batchRefs.map(ref => processFiling(ctx, ref)));

    for (const filing of outcomes) {
      if (!filing.ok) {
        logger.warn(`${filing.failure.ticker} ${filing.failure.accession_number ?? ''}: ${filing.failure.reason}`);
        result.failures.push(filing.failure);
        continue;
      }
      outcome.filings_parsed++;
      result.transactions.push(...filing.value.transactions);
      result.lineFailures.push(...filing.value.lineFailures);
      for (const line of filing.value.lineFailures) {
        logger.debug(`${line.accession_number} ${line.table} line ${line.line}: ${line.reason}`);
      }
    }
  }

  outcome.transactions = result.transactions.length;
  if (refs.length > 0 && outcome.filings_parsed === 0) outcome.failed = true;
  return result;
}

/**
 * Wait for every fetch in a batch before surfacing a fatal error, so no
 * sibling stages a file after cleanup has run.
 */
async function settleBatch<T>(pending: Promise<T>[]): Promise<T[]> {
  const settled = await Promise.allSettled(pending);
  const values: T[] = [];
  for (const result of settled) {
    if (result.status === 'rejected') throw result.reason;
    values.push(result.value);
  }
  return values;
}

async function processFiling(ctx: RunContext, ref: FilingRef): Promise<Outcome<ParseResult>> {
  try {
    const raw = await fetchFiling(ctx, ref);
    return { ok: true, value: parseFiling(raw) };
  } catch (err) {
    if (err instanceof PipelineError) return { ok: false, failure: toFailure(err) };
    throw err;
  }
}
