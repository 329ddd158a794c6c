/**
 * Column contract shared by every report emitter.
 *
 * Each table has one fixed column order; the CSV and JSON emitters both
 * read rows through this module so their outputs stay interchangeable.
 */

import type {
  CompanyFlow,
  Confidence,
  CumulativeFlow,
  FlowTables,
  LineFailure,
  MonthlyActivity,
  MonthlyFlow,
  NetFlow,
  RecentChange,
  StageFailure,
  TickerSummary,
  Transaction,
} from '../core/types.js';

export type Cell = string | number | null;

export interface ReportTable {
  name: TableName;
  columns: readonly string[];
  rows: Cell[][];
}

type Columns<T> = ReadonlyArray<keyof T & string>;

export const COMPANY_FLOW_COLUMNS: Columns<CompanyFlow> = ['ticker', 'transaction_direction', 'total_value', 'total_shares'];
export const MONTHLY_FLOW_COLUMNS: Columns<MonthlyFlow> = ['year_month', 'transaction_direction', 'total_value', 'total_shares'];
export const NET_FLOW_COLUMNS: Columns<NetFlow> = ['ticker', 'year_month', 'buy_value', 'sell_value', 'net_value'];
export const CUMULATIVE_FLOW_COLUMNS: Columns<CumulativeFlow> = ['ticker', 'year_month', 'cumulative_buy', 'cumulative_sell', 'cumulative_net'];
export const CONFIDENCE_COLUMNS: Columns<Confidence> = ['ticker', 'buy_value', 'sell_value', 'ratio'];
export const RECENT_CHANGE_COLUMNS: Columns<RecentChange> = [
  'ticker', 'latest_period', 'previous_period', 'latest_net', 'previous_net', 'change', 'change_pct',
];
export const TICKER_SUMMARY_COLUMNS: Columns<TickerSummary> = [
  'ticker', 'filing_count', 'transaction_count', 'earliest_transaction', 'latest_transaction',
  'months_with_activity', 'activity_level', 'date_range_days',
];
export const MONTHLY_ACTIVITY_COLUMNS: Columns<MonthlyActivity> = [
  'ticker', 'year_month', 'filing_count', 'first_transaction_date', 'last_transaction_date', 'transaction_date_range',
];
export const TRANSACTION_COLUMNS: Columns<Transaction> = [
  'ticker', 'accession_number', 'reporter_name', 'reporter_cik', 'transaction_date', 'transaction_code',
  'security_type', 'security_title', 'acquired_disposed', 'shares', 'price_per_share', 'total_value',
  'filing_date', 'days_since_filing', 'anomalies',
];
export const FAILURE_COLUMNS: Columns<StageFailure> = ['kind', 'ticker', 'accession_number', 'reason'];
export const LINE_FAILURE_COLUMNS: Columns<LineFailure> = ['accession_number', 'table', 'line', 'reason'];

export type TableName =
  | keyof FlowTables
  | 'transactions'
  | 'failures'
  | 'line_failures';

/** Aggregate tables, in report order */
export const FLOW_TABLE_NAMES: ReadonlyArray<keyof FlowTables> = [
  'company_flow',
  'monthly_flow',
  'net_flow',
  'cumulative_flow',
  'confidence',
  'recent_change',
  'ticker_summary',
  'monthly_activity',
];

export function toTable<T>(name: TableName, columns: Columns<T>, rows: readonly T[]): ReportTable {
  return {
    name,
    columns,
    rows: rows.map(row => columns.map(col => toCell(row[col]))),
  };
}

export function flowTable(tables: FlowTables, name: keyof FlowTables): ReportTable {
  switch (name) {
    case 'company_flow': return toTable(name, COMPANY_FLOW_COLUMNS, tables.company_flow);
    case 'monthly_flow': return toTable(name, MONTHLY_FLOW_COLUMNS, tables.monthly_flow);
    case 'net_flow': return toTable(name, NET_FLOW_COLUMNS, tables.net_flow);
    case 'cumulative_flow': return toTable(name, CUMULATIVE_FLOW_COLUMNS, tables.cumulative_flow);
    case 'confidence': return toTable(name, CONFIDENCE_COLUMNS, tables.confidence);
    case 'recent_change': return toTable(name, RECENT_CHANGE_COLUMNS, tables.recent_change);
    case 'ticker_summary': return toTable(name, TICKER_SUMMARY_COLUMNS, tables.ticker_summary);
    case 'monthly_activity': return toTable(name, MONTHLY_ACTIVITY_COLUMNS, tables.monthly_activity);
  }
}

export function transactionsTable(transactions: readonly Transaction[]): ReportTable {
  return toTable('transactions', TRANSACTION_COLUMNS, transactions);
}

export function failuresTable(failures: readonly StageFailure[]): ReportTable {
  return toTable('failures', FAILURE_COLUMNS, failures);
}

export function lineFailuresTable(failures: readonly LineFailure[]): ReportTable {
  return toTable('line_failures', LINE_FAILURE_COLUMNS, failures);
}

/** Rows as column-keyed records, in column order */
export function tableRecords(table: ReportTable): Array<Record<string, Cell>> {
  return table.rows.map(row => {
    const record: Record<string, Cell> = {};
    table.columns.forEach((col, i) => { record[col] = row[i]; });
    return record;
  });
}

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(String).join(';');
  return String(value);
}
