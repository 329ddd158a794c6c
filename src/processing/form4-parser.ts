/**
 * Form 4 document parser.
 *
 * Uses regex-based extraction since Form 4 XML has a well-defined,
 * predictable structure. This avoids adding an XML parser dependency.
 *
 * One bad transaction line never discards its siblings: the line is
 * recorded as a LineFailure and parsing moves on. Only a document that
 * is not a Form 4 ownership document at all is rejected as a whole.
 */

import { MalformedFilingError } from '../core/errors.js';
import type {
  LineFailure,
  ParseResult,
  RawFiling,
  SecurityType,
  Transaction,
  TransactionCode,
} from '../core/types.js';

export interface FilingMeta {
  ticker: string;
  accessionNumber: string;
  filingDate: string;
}

interface Reporter {
  name: string;
  cik: string;
}

type TableKind = LineFailure['table'];

const KNOWN_CODES = ['P', 'S', 'A', 'D', 'F', 'M', 'G', 'C', 'X', 'J'] as const;

function isKnownCode(code: string): code is (typeof KNOWN_CODES)[number] {
  const codes: readonly string[] = KNOWN_CODES;
  return codes.includes(code);
}

const TABLES: ReadonlyArray<{ kind: TableKind; table: string; row: string }> = [
  { kind: 'non_derivative', table: 'nonDerivativeTable', row: 'nonDerivativeTransaction' },
  { kind: 'derivative', table: 'derivativeTable', row: 'derivativeTransaction' },
];

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Pull the <ownershipDocument> element out of a body. Full submission
 * text files wrap it in SGML headers; plain XML documents return as-is.
 */
export function extractOwnershipDocument(body: string): string | null {
  const match = body.match(/<ownershipDocument>[\s\S]*?<\/ownershipDocument>/i);
  return match ? match[0] : null;
}

/**
 * Metadata for a document read from disk. The SGML header of a full
 * submission text file and the issuer symbol win over the fallbacks.
 */
export function inferFilingMeta(body: string, fallback: FilingMeta): FilingMeta {
  const accession = body.match(/ACCESSION NUMBER:\s*(\d{10}-\d{2}-\d{6})/);
  const filed = body.match(/FILED AS OF DATE:\s*(\d{4})(\d{2})(\d{2})/);
  const doc = extractOwnershipDocument(body);
  const symbol = doc ? extractTagValue(doc, 'issuerTradingSymbol') : null;

  return {
    ticker: symbol ? symbol.toUpperCase() : fallback.ticker,
    accessionNumber: accession ? accession[1] : fallback.accessionNumber,
    filingDate: filed ? `${filed[1]}-${filed[2]}-${filed[3]}` : fallback.filingDate,
  };
}

export function parseFiling(raw: RawFiling): ParseResult {
  return parseForm4Xml(raw.body, {
    ticker: raw.ref.ticker,
    accessionNumber: raw.ref.accessionNumber,
    filingDate: raw.ref.filingDate,
  });
}

/**
 * Parse a Form 4 document into normalized transactions.
 * Throws MalformedFilingError when the document can't be read at all.
 */
export function parseForm4Xml(body: string, meta: FilingMeta): ParseResult {
  const fail = (reason: string) => new MalformedFilingError(meta.ticker, meta.accessionNumber, reason);

  if (toEpochDay(meta.filingDate) === null) {
    throw fail(`invalid filing date "${meta.filingDate}"`);
  }

  const doc = extractOwnershipDocument(body);
  if (!doc) throw fail('no <ownershipDocument> element');

  const documentType = extractTagValue(doc, 'documentType');
  if (documentType !== null && documentType !== '4' && documentType !== '4/A') {
    throw fail(`document type "${documentType}" is not Form 4`);
  }

  const reporter = extractReporter(doc);
  if (!reporter) throw fail('missing reporting owner');

  const transactions: Transaction[] = [];
  const lineFailures: LineFailure[] = [];

  for (const { kind, table, row } of TABLES) {
    const tableBlock = doc.match(new RegExp(`<${table}>([\\s\\S]*?)</${table}>`, 'i'));
    if (!tableBlock) continue;

    const rowRegex = new RegExp(`<${row}>([\\s\\S]*?)</${row}>`, 'gi');
    let match;
    let line = 0;
    while ((match = rowRegex.exec(tableBlock[1])) !== null) {
      const parsed = parseTransactionLine(match[1], kind, reporter, meta);
      if (typeof parsed === 'string') {
        lineFailures.push({ accession_number: meta.accessionNumber, table: kind, line, reason: parsed });
      } else {
        transactions.push(parsed);
      }
      line++;
    }
  }

  return { transactions, lineFailures, partial: lineFailures.length > 0 };
}

function extractReporter(doc: string): Reporter | null {
  const ownerBlock = doc.match(/<reportingOwner>([\s\S]*?)<\/reportingOwner>/i);
  if (!ownerBlock) return null;

  const name = extractTagValue(ownerBlock[1], 'rptOwnerName');
  if (!name) return null;

  const cik = (extractTagValue(ownerBlock[1], 'rptOwnerCik') ?? '').replace(/\D/g, '');

  return {
    name: formatName(name),
    cik: cik ? cik.padStart(10, '0') : '',
  };
}

/** Returns the transaction, or the reason the line was rejected */
function parseTransactionLine(
  block: string,
  table: TableKind,
  reporter: Reporter,
  meta: FilingMeta
): Transaction | string {
  const dateBlock = block.match(/<transactionDate>([\s\S]*?)<\/transactionDate>/i);
  const rawDate = dateBlock ? extractTagValue(dateBlock[1], 'value') : null;
  if (!rawDate) return 'missing transaction date';
  // Dates sometimes carry a UTC offset (2024-01-15-05:00)
  const date = rawDate.slice(0, 10);
  const txnDay = toEpochDay(date);
  if (txnDay === null) return `invalid transaction date "${rawDate}"`;

  const codingBlock = block.match(/<transactionCoding>([\s\S]*?)<\/transactionCoding>/i);
  const code = codingBlock ? extractTagValue(codingBlock[1], 'transactionCode') : null;
  if (!code) return 'missing transaction code';

  const amountsBlock = block.match(/<transactionAmounts>([\s\S]*?)<\/transactionAmounts>/i);
  if (!amountsBlock) return 'missing transaction amounts';

  const shares = parseAmount(extractNestedValue(amountsBlock[1], 'transactionShares'), 'shares');
  if (typeof shares === 'string') return shares;
  const price = parseAmount(extractNestedValue(amountsBlock[1], 'transactionPricePerShare'), 'price');
  if (typeof price === 'string') return price;

  const adCode = extractNestedValue(amountsBlock[1], 'transactionAcquiredDisposedCode');
  const title = extractNestedValue(block, 'securityTitle') ?? '';

  // toEpochDay already accepted meta.filingDate in parseForm4Xml
  const filingDay = toEpochDay(meta.filingDate) ?? txnDay;
  const daysSinceFiling = filingDay - txnDay;

  return {
    ticker: meta.ticker,
    accession_number: meta.accessionNumber,
    reporter_name: reporter.name,
    reporter_cik: reporter.cik,
    transaction_date: date,
    transaction_code: normalizeCode(code),
    security_type: classifySecurity(title, table),
    security_title: title,
    acquired_disposed: adCode === 'A' || adCode === 'D' ? adCode : null,
    shares,
    price_per_share: price,
    total_value: roundCents(shares * price),
    filing_date: meta.filingDate,
    days_since_filing: daysSinceFiling,
    anomalies: daysSinceFiling < 0 ? ['transaction_after_filing'] : [],
  };
}

/** Non-negative finite number, or the reason it isn't one */
function parseAmount(raw: string | null, field: 'shares' | 'price'): number | string {
  if (raw === null || raw === '') return `missing ${field}`;
  const value = Number(raw.replace(/,/g, ''));
  if (!Number.isFinite(value)) return `non-numeric ${field} "${raw}"`;
  if (value < 0) return `negative ${field} ${raw}`;
  return value;
}

export function normalizeCode(code: string): TransactionCode {
  const upper = code.trim().toUpperCase();
  return isKnownCode(upper) ? upper : 'OTHER';
}

export function classifySecurity(title: string, table: TableKind): SecurityType {
  if (/restricted stock unit|\brsus?\b/i.test(title)) return 'restricted_stock_unit';
  if (table === 'derivative') {
    return /option|warrant|\bright\b|\bsars?\b/i.test(title) ? 'option' : 'other';
  }
  if (/preferred|note|debenture/i.test(title)) return 'other';
  if (/common|ordinary|capital stock|class [a-z]\b/i.test(title)) return 'common_stock';
  return 'other';
}

function extractTagValue(xml: string, tag: string): string | null {
  const match = xml.match(new RegExp(`<${tag}>([^<]*)</${tag}>`, 'i'));
  return match ? decodeEntities(match[1].trim()) : null;
}

function extractNestedValue(xml: string, outerTag: string): string | null {
  const outerMatch = xml.match(new RegExp(`<${outerTag}>([\\s\\S]*?)</${outerTag}>`, 'i'));
  if (!outerMatch) return null;
  // Try to get inner <value> tag first
  const valueMatch = outerMatch[1].match(/<value>([^<]*)<\/value>/i);
  if (valueMatch) return decodeEntities(valueMatch[1].trim());
  // A footnote reference alone means the value was withheld
  if (outerMatch[1].includes('<')) return null;
  return decodeEntities(outerMatch[1].trim());
}

function decodeEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

/** Whole days since the epoch for a YYYY-MM-DD date, null if invalid */
export function toEpochDay(date: string): number | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) return null;
  const ms = Date.parse(`${date}T00:00:00Z`);
  if (Number.isNaN(ms)) return null;
  // Date.parse rolls 2024-02-31 over to March; reject it instead
  if (new Date(ms).toISOString().slice(0, 10) !== date) return null;
  return Math.round(ms / DAY_MS);
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Format insider name from "LAST FIRST MIDDLE" to "First Middle Last".
 */
export function formatName(name: string): string {
  // Already in normal format (e.g., "Tim Cook")
  if (name.includes(' ') && name !== name.toUpperCase()) return name;

  const parts = name.split(/\s+/);
  if (parts.length >= 2) {
    const last = parts[0];
    const rest = parts.slice(1);
    return [...rest, last].map(p =>
      p.charAt(0).toUpperCase() + p.slice(1).toLowerCase()
    ).join(' ');
  }

  return name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
}

/** Human-readable transaction code labels */
export const TRANSACTION_CODE_LABELS: Record<TransactionCode, string> = {
  P: 'BUY',
  S: 'SELL',
  A: 'GRANT',
  D: 'DISP',
  F: 'TAX',
  M: 'EXERCISE',
  G: 'GIFT',
  C: 'CONVERT',
  X: 'EXPIRE',
  J: 'OTHER',
  OTHER: 'OTHER',
};
