import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { DataParseError } from './errors.js';
import type { MarketFlowRow } from './types.js';

/**
 * Optional market fund-flow rows supplied by an upstream collector.
 * They are validated and carried into the JSON report unchanged.
 */

const MarketFlowRowSchema = z.object({
  ticker: z.string().trim().min(1).transform(t => t.toUpperCase()),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative(),
  fund_flow: z.number(),
  fund_flow_normalized: z.number(),
});

const MarketFlowFileSchema = z.array(MarketFlowRowSchema);

export function parseMarketFlows(text: string, source: string): MarketFlowRow[] {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new DataParseError(`Invalid JSON in ${source}: ${err instanceof Error ? err.message : String(err)}`, source);
  }

  const parsed = MarketFlowFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new DataParseError(`Invalid market flow data in ${source} at [${where}]: ${issue?.message ?? 'unknown'}`, source);
  }
  return parsed.data;
}

export async function loadMarketFlows(path: string): Promise<MarketFlowRow[]> {
  return parseMarketFlows(await readFile(path, 'utf8'), path);
}
