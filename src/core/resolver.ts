import { z } from 'zod';
import { UnknownTickerError, DataParseError } from './errors.js';
import type { RunContext } from './context.js';
import type { Company } from './types.js';

/**
 * Company resolver: ticker -> CIK.
 *
 * Uses SEC's company tickers JSON endpoint which maps all tickers to CIKs.
 * This is cached aggressively since tickers rarely change.
 *
 * Resolution order:
 * 1. Run cache
 * 2. Configured CIK overrides
 * 3. SEC ticker directory
 */

export const TICKERS_URL = 'https://www.sec.gov/files/company_tickers.json';

const TickerDirectorySchema = z.record(
  z.string(),
  z.object({
    cik_str: z.number().int().nonnegative(),
    ticker: z.string(),
    title: z.string(),
  })
);

export function padCik(cik: string | number): string {
  return String(cik).padStart(10, '0');
}

async function loadDirectory(ctx: RunContext): Promise<Map<string, Company>> {
  if (ctx.directory) return ctx.directory;

  const body = await ctx.client.get(TICKERS_URL, { cacheTtlHours: 168 }); // 7 days

  let data: z.infer<typeof TickerDirectorySchema>;
  try {
    data = TickerDirectorySchema.parse(JSON.parse(body));
  } catch {
    throw new DataParseError(
      'Failed to parse SEC company tickers data. The response may be corrupted. Try clearing the cache with: form4-flow cache --clear',
      TICKERS_URL
    );
  }

  const directory = new Map<string, Company>();
  for (const entry of Object.values(data)) {
    const ticker = entry.ticker.toUpperCase();
    if (!directory.has(ticker)) {
      directory.set(ticker, { ticker, cik: padCik(entry.cik_str), name: entry.title });
    }
  }

  ctx.directory = directory;
  ctx.logger.debug(`Loaded ${directory.size} tickers from SEC directory`);
  return directory;
}

/**
 * Resolve a ticker to its company. Throws UnknownTickerError when
 * the ticker is blank or not in the directory.
 */
export async function resolveTicker(ctx: RunContext, rawTicker: string): Promise<Company> {
  const ticker = rawTicker.trim().toUpperCase();
  if (!ticker) throw new UnknownTickerError(rawTicker);

  const cached = ctx.companies.get(ticker);
  if (cached) return cached;

  const override = ctx.config.cikOverrides[ticker];
  if (override) {
    const company = { ticker, cik: padCik(override), name: ticker };
    ctx.companies.set(ticker, company);
    return company;
  }

  const directory = await loadDirectory(ctx);
  // Class shares are listed with dashes (BRK-B); accept BRK.B too
  const match = directory.get(ticker) ?? directory.get(ticker.replace(/\./g, '-'));
  if (!match) throw new UnknownTickerError(ticker);

  const company = { ...match, ticker };
  ctx.companies.set(ticker, company);
  return company;
}
