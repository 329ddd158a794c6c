import { mkdtempSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, type ConfigInput } from '../src/core/config.js';
import { createRunContext, type RunContext } from '../src/core/context.js';
import type { FetchFn } from '../src/core/sec-client.js';

/** One canned reply; an error is thrown from fetch instead of returning */
export interface FakeReply {
  status?: number;
  body?: string;
  error?: Error;
}

export type FakeRoutes = Record<string, string | FakeReply | FakeReply[]>;

/**
 * In-process stand-in for fetch. Unknown URLs answer 404; a list of
 * replies is served in order, repeating the last one.
 */
export function fakeFetch(routes: FakeRoutes): { fetchFn: FetchFn; calls: string[] } {
  const calls: string[] = [];
  const served = new Map<string, number>();

  const fetchFn: FetchFn = async url => {
    calls.push(url);
    const route = routes[url];
    if (route === undefined) return new Response('Not Found', { status: 404 });

    let reply: FakeReply;
    if (Array.isArray(route)) {
      const index = served.get(url) ?? 0;
      served.set(url, index + 1);
      reply = route[Math.min(index, route.length - 1)];
    } else {
      reply = typeof route === 'string' ? { body: route } : route;
    }

    if (reply.error) throw reply.error;
    return new Response(reply.body ?? '', { status: reply.status ?? 200 });
  };

  return { fetchFn, calls };
}

export function tempDir(prefix = 'form4-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function testContext(routes: FakeRoutes, overrides: ConfigInput = {}): { ctx: RunContext; calls: string[] } {
  const { fetchFn, calls } = fakeFetch(routes);
  const config = loadConfig({
    userAgent: 'form4-flow-tests test@example.com',
    outputDir: tempDir(),
    backoffBaseMs: 0,
    ...overrides,
  }, {});
  return { ctx: createRunContext(config, { fetchFn, cache: null }), calls };
}

export interface Form4Row {
  date: string;
  code: string;
  shares?: string;
  price?: string;
  ad?: 'A' | 'D';
  title?: string;
}

export interface Form4Fixture {
  symbol?: string;
  owner?: string;
  ownerCik?: string;
  documentType?: string;
  rows?: Form4Row[];
  derivativeRows?: Form4Row[];
}

function rowXml(tag: string, row: Form4Row): string {
  const shares = row.shares === undefined ? '' : `<transactionShares><value>${row.shares}</value></transactionShares>`;
  const price = row.price === undefined ? '' : `<transactionPricePerShare><value>${row.price}</value></transactionPricePerShare>`;
  return `
    <${tag}>
      <securityTitle><value>${row.title ?? 'Common Stock'}</value></securityTitle>
      <transactionDate><value>${row.date}</value></transactionDate>
      <transactionCoding>
        <transactionFormType>4</transactionFormType>
        <transactionCode>${row.code}</transactionCode>
      </transactionCoding>
      <transactionAmounts>
        ${shares}
        ${price}
        <transactionAcquiredDisposedCode><value>${row.ad ?? 'A'}</value></transactionAcquiredDisposedCode>
      </transactionAmounts>
    </${tag}>`;
}

export function form4Xml(fixture: Form4Fixture = {}): string {
  const rows = (fixture.rows ?? []).map(r => rowXml('nonDerivativeTransaction', r)).join('');
  const derivative = (fixture.derivativeRows ?? []).map(r => rowXml('derivativeTransaction', r)).join('');
  return `<?xml version="1.0"?>
<ownershipDocument>
  <schemaVersion>X0508</schemaVersion>
  <documentType>${fixture.documentType ?? '4'}</documentType>
  <issuer>
    <issuerCik>0000320193</issuerCik>
    <issuerName>Example Corp</issuerName>
    <issuerTradingSymbol>${fixture.symbol ?? 'AAPL'}</issuerTradingSymbol>
  </issuer>
  <reportingOwner>
    <reportingOwnerId>
      <rptOwnerCik>${fixture.ownerCik ?? '0001214156'}</rptOwnerCik>
      <rptOwnerName>${fixture.owner ?? 'DOE JANE'}</rptOwnerName>
    </reportingOwnerId>
  </reportingOwner>
  <nonDerivativeTable>${rows}
  </nonDerivativeTable>
  <derivativeTable>${derivative}
  </derivativeTable>
</ownershipDocument>`;
}

export interface SubmissionRow {
  accession: string;
  date: string;
  form?: string;
  doc?: string;
}

export function submissionsPage(rows: SubmissionRow[]) {
  return {
    accessionNumber: rows.map(r => r.accession),
    filingDate: rows.map(r => r.date),
    form: rows.map(r => r.form ?? '4'),
    primaryDocument: rows.map(r => r.doc ?? `xslF345X05/${r.accession}.xml`),
  };
}

export function submissionsJson(rows: SubmissionRow[], olderPages: string[] = []): string {
  return JSON.stringify({
    cik: '320193',
    name: 'Example Corp',
    filings: {
      recent: submissionsPage(rows),
      files: olderPages.map(name => ({ name })),
    },
  });
}

export function tickersJson(entries: Array<{ ticker: string; cik: number; title: string }>): string {
  const directory: Record<string, { cik_str: number; ticker: string; title: string }> = {};
  entries.forEach((e, i) => {
    directory[String(i)] = { cik_str: e.cik, ticker: e.ticker, title: e.title };
  });
  return JSON.stringify(directory);
}
