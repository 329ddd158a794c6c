/**
 * Core data model for form4-flow.
 *
 * Design principles:
 * - Transactions are derived from filings, never edited after parsing
 * - Aggregate rows are recomputed every run, never stored as truth
 * - Every transaction keeps a back-reference to its accession number
 */

/** Resolved issuer */
export interface Company {
  ticker: string;
  /** 10-digit zero padded CIK */
  cik: string;
  name: string;
}

export interface FilingRef {
  accessionNumber: string;
  cik: string;
  ticker: string;
  form: string;
  filingDate: string;
  primaryDocument: string;
  documentUrl: string;
}

export interface RawFiling {
  ref: FilingRef;
  body: string;
  retrievedAt: string;
  stagedPath: string;
}

// ── Form 4 Transaction Types ──────────────────────────────────────────

/** SEC Form 4 transaction codes */
export type TransactionCode =
  | 'P'  // Open market purchase
  | 'S'  // Open market sale
  | 'A'  // Grant/award
  | 'D'  // Disposition to issuer
  | 'F'  // Tax withholding
  | 'M'  // Option exercise
  | 'G'  // Gift
  | 'C'  // Conversion
  | 'X'  // Option expiration
  | 'J'  // Other
  | 'OTHER'
  ;

export type SecurityType = 'common_stock' | 'restricted_stock_unit' | 'option' | 'other';

export type TransactionDirection = 'BUY' | 'SELL';

export type TransactionAnomaly = 'transaction_after_filing';

export interface Transaction {
  ticker: string;
  accession_number: string;
  reporter_name: string;
  reporter_cik: string;
  transaction_date: string;
  transaction_code: TransactionCode;
  security_type: SecurityType;
  security_title: string;
  acquired_disposed: 'A' | 'D' | null;
  shares: number;
  price_per_share: number;
  total_value: number;
  filing_date: string;
  days_since_filing: number;
  anomalies: TransactionAnomaly[];
}

export interface LineFailure {
  accession_number: string;
  table: 'non_derivative' | 'derivative';
  /** 0-based position of the line within its table */
  line: number;
  reason: string;
}

export interface ParseResult {
  transactions: Transaction[];
  lineFailures: LineFailure[];
  /** True when at least one line could not be extracted */
  partial: boolean;
}

// ── Aggregate Rows ────────────────────────────────────────────────────

export interface CompanyFlow {
  ticker: string;
  transaction_direction: TransactionDirection;
  total_value: number;
  total_shares: number;
}

export interface MonthlyFlow {
  year_month: string;
  transaction_direction: TransactionDirection;
  total_value: number;
  total_shares: number;
}

export interface NetFlow {
  ticker: string;
  year_month: string;
  buy_value: number;
  sell_value: number;
  net_value: number;
}

export interface CumulativeFlow {
  ticker: string;
  year_month: string;
  cumulative_buy: number;
  cumulative_sell: number;
  cumulative_net: number;
}

export const UNDEFINED_RATIO = 'undefined' as const;

export interface Confidence {
  ticker: string;
  buy_value: number;
  sell_value: number;
  ratio: number | typeof UNDEFINED_RATIO;
}

export interface RecentChange {
  ticker: string;
  latest_period: string;
  previous_period: string;
  latest_net: number;
  previous_net: number;
  change: number;
  /** change / |previous_net|, null when previous_net is zero */
  change_pct: number | null;
}

export interface TickerSummary {
  ticker: string;
  filing_count: number;
  transaction_count: number;
  earliest_transaction: string;
  latest_transaction: string;
  months_with_activity: number;
  activity_level: number;
  /** Days between earliest and latest transaction */
  date_range_days: number;
}

export interface MonthlyActivity {
  ticker: string;
  year_month: string;
  filing_count: number;
  first_transaction_date: string;
  last_transaction_date: string;
  transaction_date_range: number;
}

export interface FlowTables {
  company_flow: CompanyFlow[];
  monthly_flow: MonthlyFlow[];
  net_flow: NetFlow[];
  cumulative_flow: CumulativeFlow[];
  confidence: Confidence[];
  recent_change: RecentChange[];
  ticker_summary: TickerSummary[];
  monthly_activity: MonthlyActivity[];
}

/** Row shape of the external market-data collaborator, embedded as-is in reports */
export interface MarketFlowRow {
  ticker: string;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  fund_flow: number;
  fund_flow_normalized: number;
}

// ── Run Outcomes ──────────────────────────────────────────────────────

export type FailureKind =
  | 'UnknownTicker'
  | 'IndexUnavailable'
  | 'FetchFailed'
  | 'FilingNotFound'
  | 'MalformedFiling'
  | 'Skipped';

export interface StageFailure {
  kind: FailureKind;
  ticker: string;
  accession_number: string | null;
  reason: string;
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: StageFailure };

export type RunStatus = 'success' | 'partial' | 'failure';

export interface TickerOutcome {
  ticker: string;
  cik: string | null;
  filings_listed: number;
  filings_parsed: number;
  transactions: number;
  failed: boolean;
}

export interface ReportFile {
  table: string;
  path: string;
}

export interface RunReport {
  status: RunStatus;
  started_at: string;
  finished_at: string;
  tickers: TickerOutcome[];
  failures: StageFailure[];
  line_failures: LineFailure[];
  transactions: Transaction[];
  tables: FlowTables;
  reports: ReportFile[];
  cleanup: {
    kept_intermediate: boolean;
    deleted: number;
    retained: number;
    failures: Array<{ path: string; reason: string }>;
  };
}
