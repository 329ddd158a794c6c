import { describe, it, expect } from 'vitest';
import {
  classifySecurity,
  extractOwnershipDocument,
  formatName,
  inferFilingMeta,
  normalizeCode,
  parseFiling,
  parseForm4Xml,
  toEpochDay,
} from '../src/processing/form4-parser.js';
import { MalformedFilingError } from '../src/core/errors.js';
import { form4Xml } from './helpers.js';
import type { FilingMeta } from '../src/processing/form4-parser.js';

const META: FilingMeta = { ticker: 'AAPL', accessionNumber: '0000320193-24-000001', filingDate: '2025-10-17' };

const SAMPLE_FORM4_SALE = `<?xml version="1.0"?>
<ownershipDocument>
  <documentType>4</documentType>
  <issuer>
    <issuerCik>0000320193</issuerCik>
    <issuerName>Example Corp</issuerName>
    <issuerTradingSymbol>AAPL</issuerTradingSymbol>
  </issuer>
  <reportingOwner>
    <reportingOwnerId>
      <rptOwnerCik>0001234567</rptOwnerCik>
      <rptOwnerName>DOE JOHN A</rptOwnerName>
    </reportingOwnerId>
    <reportingOwnerRelationship>
      <isDirector>1</isDirector>
      <isOfficer>1</isOfficer>
      <officerTitle>Chief Executive Officer</officerTitle>
    </reportingOwnerRelationship>
  </reportingOwner>
  <nonDerivativeTable>
    <nonDerivativeTransaction>
      <securityTitle><value>Common Stock</value></securityTitle>
      <transactionDate><value>2025-10-15</value></transactionDate>
      <transactionCoding>
        <transactionCode>S</transactionCode>
      </transactionCoding>
      <transactionAmounts>
        <transactionShares><value>100000</value></transactionShares>
        <transactionPricePerShare><value>175.50</value></transactionPricePerShare>
        <transactionAcquiredDisposedCode><value>D</value></transactionAcquiredDisposedCode>
      </transactionAmounts>
      <postTransactionAmounts>
        <sharesOwnedFollowingTransaction><value>3276941</value></sharesOwnedFollowingTransaction>
      </postTransactionAmounts>
    </nonDerivativeTransaction>
  </nonDerivativeTable>
</ownershipDocument>`;

describe('parseForm4Xml', () => {
  it('parses a sale transaction', () => {
    const { transactions, lineFailures, partial } = parseForm4Xml(SAMPLE_FORM4_SALE, META);
    expect(lineFailures).toEqual([]);
    expect(partial).toBe(false);
    expect(transactions).toEqual([{
      ticker: 'AAPL',
      accession_number: '0000320193-24-000001',
      reporter_name: 'John A Doe',
      reporter_cik: '0001234567',
      transaction_date: '2025-10-15',
      transaction_code: 'S',
      security_type: 'common_stock',
      security_title: 'Common Stock',
      acquired_disposed: 'D',
      shares: 100000,
      price_per_share: 175.5,
      total_value: 17550000,
      filing_date: '2025-10-17',
      days_since_filing: 2,
      anomalies: [],
    }]);
  });

  it('parses multiple transactions from one filing in document order', () => {
    const xml = form4Xml({
      rows: [
        { date: '2025-12-01', code: 'M', shares: '10000', price: '50.00', ad: 'A' },
        { date: '2025-12-01', code: 'S', shares: '5000', price: '200.00', ad: 'D' },
      ],
    });
    const { transactions } = parseForm4Xml(xml, { ...META, filingDate: '2025-12-02' });
    expect(transactions.map(t => [t.transaction_code, t.shares, t.total_value])).toEqual([
      ['M', 10000, 500000],
      ['S', 5000, 1000000],
    ]);
  });

  it('keeps valid lines when a sibling line has no price', () => {
    const xml = form4Xml({
      rows: [
        { date: '2024-01-10', code: 'P', shares: '100' },
        { date: '2024-01-11', code: 'S', shares: '40', price: '10.00', ad: 'D' },
      ],
    });
    const result = parseForm4Xml(xml, { ...META, filingDate: '2024-01-12' });

    expect(result.partial).toBe(true);
    expect(result.lineFailures).toEqual([{
      accession_number: '0000320193-24-000001',
      table: 'non_derivative',
      line: 0,
      reason: 'missing price',
    }]);
    expect(result.transactions).toHaveLength(1);
    expect(result.transactions[0].transaction_code).toBe('S');
    expect(result.transactions[0].total_value).toBe(400);
  });

  it('treats a footnote-only price as missing', () => {
    const xml = form4Xml({ rows: [{ date: '2024-01-10', code: 'G', shares: '100', price: '0' }] })
      .replace('<transactionPricePerShare><value>0</value></transactionPricePerShare>',
        '<transactionPricePerShare><footnoteId id="F1"/></transactionPricePerShare>');
    const result = parseForm4Xml(xml, { ...META, filingDate: '2024-01-12' });
    expect(result.transactions).toEqual([]);
    expect(result.lineFailures.map(f => f.reason)).toEqual(['missing price']);
  });

  it('reports each kind of bad line with its reason', () => {
    const xml = form4Xml({
      rows: [
        { date: '2024-02-30', code: 'P', shares: '1', price: '1' },
        { date: '2024-02-01', code: '', shares: '1', price: '1' },
        { date: '2024-02-01', code: 'P', shares: 'abc', price: '1' },
        { date: '2024-02-01', code: 'P', shares: '1', price: '-2' },
      ],
    });
    const result = parseForm4Xml(xml, { ...META, filingDate: '2024-02-05' });
    expect(result.lineFailures.map(f => `${f.line}: ${f.reason}`)).toEqual([
      '0: invalid transaction date "2024-02-30"',
      '1: missing transaction code',
      '2: non-numeric shares "abc"',
      '3: negative price -2',
    ]);
  });

  it('reads the derivative table and numbers its lines separately', () => {
    const xml = form4Xml({
      rows: [{ date: '2024-03-01', code: 'M', shares: '500', price: '0', ad: 'A' }],
      derivativeRows: [
        { date: '2024-03-01', code: 'M', shares: '500', title: 'Stock Option (Right to Buy)', ad: 'D' },
        { date: '2024-03-01', code: 'A', shares: '1000', price: '0', title: 'Restricted Stock Units', ad: 'A' },
      ],
    });
    const result = parseForm4Xml(xml, { ...META, filingDate: '2024-03-04' });

    expect(result.lineFailures).toEqual([{
      accession_number: '0000320193-24-000001',
      table: 'derivative',
      line: 0,
      reason: 'missing price',
    }]);
    expect(result.transactions.map(t => t.security_type)).toEqual(['common_stock', 'restricted_stock_unit']);
  });

  it('flags transactions dated after the filing instead of clamping', () => {
    const xml = form4Xml({ rows: [{ date: '2024-03-10', code: 'P', shares: '10', price: '5' }] });
    const [txn] = parseForm4Xml(xml, { ...META, filingDate: '2024-03-05' }).transactions;
    expect(txn.days_since_filing).toBe(-5);
    expect(txn.anomalies).toEqual(['transaction_after_filing']);
  });

  it('drops a UTC offset on transaction dates', () => {
    const xml = form4Xml({ rows: [{ date: '2024-01-15-05:00', code: 'P', shares: '10', price: '5' }] });
    const [txn] = parseForm4Xml(xml, { ...META, filingDate: '2024-01-17' }).transactions;
    expect(txn.transaction_date).toBe('2024-01-15');
    expect(txn.days_since_filing).toBe(2);
  });

  it('accepts thousands separators and keeps fractional shares', () => {
    const xml = form4Xml({ rows: [{ date: '2025-12-01', code: 'S', shares: '1,000.5', price: '10', ad: 'D' }] });
    const [txn] = parseForm4Xml(xml, { ...META, filingDate: '2025-12-02' }).transactions;
    expect(txn.shares).toBe(1000.5);
    expect(txn.price_per_share).toBe(10);
    expect(txn.total_value).toBe(10005);
  });

  it('parses nested value tags with whitespace correctly', () => {
    const xml = SAMPLE_FORM4_SALE
      .replace('<transactionShares><value>100000</value></transactionShares>', '<transactionShares>\n  <value>2500</value>\n</transactionShares>')
      .replace('<transactionPricePerShare><value>175.50</value></transactionPricePerShare>', '<transactionPricePerShare>\n  <value>99.99</value>\n</transactionPricePerShare>');
    const [txn] = parseForm4Xml(xml, META).transactions;
    expect(txn.shares).toBe(2500);
    expect(txn.price_per_share).toBe(99.99);
    expect(txn.total_value).toBe(249975);
  });

  it('handles a filing with no transaction tables', () => {
    const xml = SAMPLE_FORM4_SALE.replace(/<nonDerivativeTable>[\s\S]*<\/nonDerivativeTable>/, '');
    expect(parseForm4Xml(xml, META)).toEqual({ transactions: [], lineFailures: [], partial: false });
  });

  it('decodes entities in owner names', () => {
    const xml = form4Xml({ owner: 'Smith &amp; Jones Capital LLC', rows: [{ date: '2024-01-02', code: 'P', shares: '1', price: '1' }] });
    const [txn] = parseForm4Xml(xml, { ...META, filingDate: '2024-01-03' }).transactions;
    expect(txn.reporter_name).toBe('Smith & Jones Capital LLC');
  });

  it('rejects documents that are not Form 4 ownership documents', () => {
    expect(() => parseForm4Xml('not xml at all', META)).toThrow(MalformedFilingError);
    expect(() => parseForm4Xml(form4Xml({ documentType: '3' }), META)).toThrow('document type "3" is not Form 4');
    expect(() => parseForm4Xml(SAMPLE_FORM4_SALE.replace(/<reportingOwner>[\s\S]*<\/reportingOwner>/, ''), META))
      .toThrow('missing reporting owner');
    expect(() => parseForm4Xml(SAMPLE_FORM4_SALE, { ...META, filingDate: 'yesterday' }))
      .toThrow('invalid filing date "yesterday"');
  });

  it('accepts amended filings', () => {
    const xml = form4Xml({ documentType: '4/A', rows: [{ date: '2024-01-02', code: 'P', shares: '1', price: '1' }] });
    expect(parseForm4Xml(xml, { ...META, filingDate: '2024-01-03' }).transactions).toHaveLength(1);
  });
});

describe('parseFiling', () => {
  it('takes metadata from the filing reference', () => {
    const result = parseFiling({
      ref: {
        accessionNumber: '0000320193-24-000007',
        cik: '0000320193',
        ticker: 'AAPL',
        form: '4',
        filingDate: '2025-10-16',
        primaryDocument: 'form4.xml',
        documentUrl: 'https://www.sec.gov/Archives/edgar/data/320193/000032019324000007/form4.xml',
      },
      body: SAMPLE_FORM4_SALE,
      retrievedAt: '2025-10-18T00:00:00.000Z',
      stagedPath: '/tmp/0000320193-24-000007.xml',
    });
    expect(result.transactions[0].accession_number).toBe('0000320193-24-000007');
    expect(result.transactions[0].days_since_filing).toBe(1);
  });
});

describe('extractOwnershipDocument', () => {
  it('pulls the XML out of a full submission text file', () => {
    const txt = `<SEC-DOCUMENT>0000320193-24-000001.txt : 20240105
ACCESSION NUMBER:\t\t0000320193-24-000001
FILED AS OF DATE:\t\t20240105
<DOCUMENT>
<TYPE>4
<XML>
${SAMPLE_FORM4_SALE.replace('<?xml version="1.0"?>\n', '')}
</XML>
</DOCUMENT>
</SEC-DOCUMENT>`;
    const doc = extractOwnershipDocument(txt);
    expect(doc?.startsWith('<ownershipDocument>')).toBe(true);
    expect(doc?.endsWith('</ownershipDocument>')).toBe(true);

    expect(inferFilingMeta(txt, { ticker: 'UNKNOWN', accessionNumber: 'file', filingDate: '2000-01-01' })).toEqual({
      ticker: 'AAPL',
      accessionNumber: '0000320193-24-000001',
      filingDate: '2024-01-05',
    });
  });

  it('returns null when there is no ownership document', () => {
    expect(extractOwnershipDocument('<html></html>')).toBeNull();
  });
});

describe('inferFilingMeta', () => {
  it('falls back when the body has no header or symbol', () => {
    const fallback = { ticker: 'MSFT', accessionNumber: 'local-file', filingDate: '2024-06-01' };
    expect(inferFilingMeta('<ownershipDocument></ownershipDocument>', fallback)).toEqual(fallback);
  });
});

describe('normalizeCode', () => {
  it('uppercases known codes and maps the rest to OTHER', () => {
    expect(normalizeCode(' p ')).toBe('P');
    expect(normalizeCode('S')).toBe('S');
    expect(normalizeCode('Z')).toBe('OTHER');
    expect(normalizeCode('W')).toBe('OTHER');
  });
});

describe('classifySecurity', () => {
  it('classifies by title and table', () => {
    expect(classifySecurity('Common Stock', 'non_derivative')).toBe('common_stock');
    expect(classifySecurity('Class A Ordinary Shares', 'non_derivative')).toBe('common_stock');
    expect(classifySecurity('Series B Preferred Stock', 'non_derivative')).toBe('other');
    expect(classifySecurity('Restricted Stock Units', 'derivative')).toBe('restricted_stock_unit');
    expect(classifySecurity('Employee Stock Option (Right to Buy)', 'derivative')).toBe('option');
    expect(classifySecurity('Convertible Note', 'derivative')).toBe('other');
  });
});

describe('formatName', () => {
  it('formats ALL CAPS names as First Middle Last', () => {
    expect(formatName('DOE JOHN A')).toBe('John A Doe');
  });

  it('leaves mixed-case names alone', () => {
    expect(formatName('Jane Doe')).toBe('Jane Doe');
  });
});

describe('toEpochDay', () => {
  it('rejects impossible dates', () => {
    expect(toEpochDay('2024-02-29')).toBe(19782);
    expect(toEpochDay('2023-02-29')).toBeNull();
    expect(toEpochDay('20240101')).toBeNull();
  });
});
