/**
 * Form 4 filing index.
 *
 * Walks a company's submissions history on EDGAR: the `recent` block is
 * the first page, each entry in `filings.files` is an older page. Stops
 * once enough distinct Form 4 accessions are collected or history runs out.
 */

import { z } from 'zod';
import { SEC_BASE_URL, filingDocumentUrl } from '../core/sec-client.js';
import { DataParseError, IndexUnavailableError } from '../core/errors.js';
import type { RunContext } from '../core/context.js';
import type { Company, FilingRef } from '../core/types.js';

export const FORM4_TYPES: readonly string[] = ['4', '4/A'];

export const ACCESSION_PATTERN = /^\d{10}-\d{2}-\d{6}$/;

const FilingColumnsSchema = z.object({
  accessionNumber: z.array(z.string()),
  filingDate: z.array(z.string()),
  form: z.array(z.string()),
  primaryDocument: z.array(z.string()),
});

const SubmissionsSchema = z.object({
  filings: z.object({
    recent: FilingColumnsSchema,
    files: z.array(z.object({ name: z.string() })).default([]),
  }),
});

export type FilingColumns = z.infer<typeof FilingColumnsSchema>;

export interface ListFilingsOptions {
  /** Earliest filing date to include (YYYY-MM-DD) */
  since?: string | null;
}

export function submissionsUrl(cik: string): string {
  return `${SEC_BASE_URL}/submissions/CIK${cik.padStart(10, '0')}.json`;
}

/**
 * Turn one index page into FilingRefs, keeping Form 4 rows only.
 * Rows with malformed accession numbers are dropped.
 */
export function filingRefsFromPage(company: Company, page: FilingColumns): FilingRef[] {
  const refs: FilingRef[] = [];
  const count = Math.min(
    page.accessionNumber.length,
    page.filingDate.length,
    page.form.length,
    page.primaryDocument.length
  );

  for (let i = 0; i < count; i++) {
    const form = page.form[i];
    const accessionNumber = page.accessionNumber[i].trim();
    if (!FORM4_TYPES.includes(form) || !ACCESSION_PATTERN.test(accessionNumber)) continue;

    // primaryDocument often points to the XSLT-rendered view
    // (e.g. "xslF345X05/wk-form4_123.xml"); the raw XML sits at the filing root.
    const primary = page.primaryDocument[i].split('/').pop() ?? '';
    const filename = primary || `${accessionNumber}.txt`;

    refs.push({
      accessionNumber,
      cik: company.cik,
      ticker: company.ticker,
      form,
      filingDate: page.filingDate[i],
      primaryDocument: filename,
      documentUrl: filingDocumentUrl(company.cik, accessionNumber, filename),
    });
  }

  return refs;
}

/** Newest filing date first; accession breaks ties so order is stable */
export function compareNewestFirst(a: FilingRef, b: FilingRef): number {
  return b.filingDate.localeCompare(a.filingDate) || b.accessionNumber.localeCompare(a.accessionNumber);
}

/**
 * List up to maxCount Form 4 filings for a company, newest first.
 * Accessions already claimed earlier in the run (by any ticker) are skipped.
 */
export async function listFilings(
  ctx: RunContext,
  company: Company,
  maxCount: number,
  options: ListFilingsOptions = {}
): Promise<FilingRef[]> {
  if (maxCount < 1) return [];
  const since = options.since ?? null;

  let olderPages: string[];
  let firstPage: FilingColumns;
  try {
    const url = submissionsUrl(company.cik);
    const body = await ctx.client.get(url, { cacheTtlHours: 24 }); // 1 day
    const parsed = parseJson(SubmissionsSchema, body, url);
    firstPage = parsed.filings.recent;
    olderPages = parsed.filings.files.map(f => f.name);
  } catch (err) {
    throw new IndexUnavailableError(company.ticker, err instanceof Error ? err : new Error(String(err)));
  }

  const collected = new Map<string, FilingRef>();
  let page: FilingColumns | null = firstPage;

  while (page) {
    let reachedCutoff = false;
    for (const ref of filingRefsFromPage(company, page)) {
      if (since && ref.filingDate < since) {
        reachedCutoff = true;
        continue;
      }
      if (collected.has(ref.accessionNumber)) continue;
      const owner = ctx.seenAccessions.get(ref.accessionNumber);
      if (owner !== undefined) {
        ctx.logger.debug(`${ref.accessionNumber} already collected for ${owner}, skipping`);
        continue;
      }
      collected.set(ref.accessionNumber, ref);
    }

    if (collected.size >= maxCount || reachedCutoff) break;

    const next = olderPages.shift();
    page = next ? await fetchOlderPage(ctx, next) : null;
  }

  const refs = [...collected.values()].sort(compareNewestFirst).slice(0, maxCount);
  for (const ref of refs) ctx.seenAccessions.set(ref.accessionNumber, company.ticker);

  ctx.logger.debug(`${company.ticker}: ${refs.length} Form 4 filing(s) listed`);
  return refs;
}

/** Older pages are best effort: a missing page ends the history */
async function fetchOlderPage(ctx: RunContext, name: string): Promise<FilingColumns | null> {
  const url = `${SEC_BASE_URL}/submissions/${name}`;
  try {
    const body = await ctx.client.get(url, { cacheTtlHours: 24 });
    return parseJson(FilingColumnsSchema, body, url);
  } catch (err) {
    ctx.logger.warn(`Stopped paging at ${name}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

function parseJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: string, url: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    throw new DataParseError(`Failed to parse JSON from ${url}`, url);
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new DataParseError(`Unexpected index format at ${url}: ${result.error.issues[0]?.message ?? 'invalid'}`, url);
  }
  return result.data;
}
