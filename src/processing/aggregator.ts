/**
 * Fund-flow aggregation over parsed Form 4 transactions.
 *
 * Pure: no I/O, no clock. Input is put in a canonical order before any
 * summation so the same set of transactions always yields identical
 * tables, whatever order it arrived in.
 *
 * Open market purchases (P) and other acquisitions (J) count as buys,
 * open market sales (S) as sells. Grants, exercises, gifts and tax
 * withholding are not market signals.
 */

import {
  UNDEFINED_RATIO,
  type CompanyFlow,
  type Confidence,
  type CumulativeFlow,
  type FlowTables,
  type MonthlyActivity,
  type MonthlyFlow,
  type NetFlow,
  type RecentChange,
  type TickerSummary,
  type Transaction,
  type TransactionCode,
  type TransactionDirection,
} from '../core/types.js';
import { toEpochDay } from './form4-parser.js';

const DIRECTIONS: readonly TransactionDirection[] = ['BUY', 'SELL'];

export function directionOf(code: TransactionCode): TransactionDirection | null {
  if (code === 'P' || code === 'J') return 'BUY';
  if (code === 'S') return 'SELL';
  return null;
}

export function yearMonth(date: string): string {
  return date.slice(0, 7);
}

export function compareTransactions(a: Transaction, b: Transaction): number {
  return compareText(a.ticker, b.ticker)
    || compareText(a.transaction_date, b.transaction_date)
    || compareText(a.accession_number, b.accession_number)
    || compareText(a.reporter_name, b.reporter_name)
    || compareText(a.transaction_code, b.transaction_code)
    || a.shares - b.shares
    || a.price_per_share - b.price_per_share;
}

interface Totals {
  value: number;
  shares: number;
}

interface DirectedTransaction {
  txn: Transaction;
  direction: TransactionDirection;
}

export function aggregate(transactions: readonly Transaction[]): FlowTables {
  const sorted = [...transactions].sort(compareTransactions);
  const directed: DirectedTransaction[] = [];
  for (const txn of sorted) {
    const direction = directionOf(txn.transaction_code);
    if (direction) directed.push({ txn, direction });
  }

  const netFlow = buildNetFlow(directed);
  const cumulativeFlow = buildCumulativeFlow(netFlow);

  return {
    company_flow: buildCompanyFlow(directed),
    monthly_flow: buildMonthlyFlow(directed),
    net_flow: netFlow,
    cumulative_flow: cumulativeFlow,
    confidence: buildConfidence(directed),
    recent_change: buildRecentChange(cumulativeFlow),
    ticker_summary: buildTickerSummary(sorted),
    monthly_activity: buildMonthlyActivity(sorted),
  };
}

function buildCompanyFlow(directed: DirectedTransaction[]): CompanyFlow[] {
  const groups = groupTotals(directed, ({ txn, direction }) => [txn.ticker, direction]);
  const rows: CompanyFlow[] = [];
  for (const ticker of uniqueSorted(directed.map(d => d.txn.ticker))) {
    for (const direction of DIRECTIONS) {
      const totals = groups.get(key(ticker, direction));
      if (!totals) continue;
      rows.push({
        ticker,
        transaction_direction: direction,
        total_value: roundCents(totals.value),
        total_shares: roundShares(totals.shares),
      });
    }
  }
  return rows;
}

function buildMonthlyFlow(directed: DirectedTransaction[]): MonthlyFlow[] {
  const groups = groupTotals(directed, ({ txn, direction }) => [yearMonth(txn.transaction_date), direction]);
  const rows: MonthlyFlow[] = [];
  for (const month of uniqueSorted(directed.map(d => yearMonth(d.txn.transaction_date)))) {
    for (const direction of DIRECTIONS) {
      const totals = groups.get(key(month, direction));
      if (!totals) continue;
      rows.push({
        year_month: month,
        transaction_direction: direction,
        total_value: roundCents(totals.value),
        total_shares: roundShares(totals.shares),
      });
    }
  }
  return rows;
}

function buildNetFlow(directed: DirectedTransaction[]): NetFlow[] {
  const groups = new Map<string, { ticker: string; month: string; buy: number; sell: number }>();
  for (const { txn, direction } of directed) {
    const month = yearMonth(txn.transaction_date);
    const k = key(txn.ticker, month);
    let group = groups.get(k);
    if (!group) {
      group = { ticker: txn.ticker, month, buy: 0, sell: 0 };
      groups.set(k, group);
    }
    if (direction === 'BUY') group.buy += txn.total_value;
    else group.sell += txn.total_value;
  }

  return [...groups.values()]
    .sort((a, b) => compareText(a.ticker, b.ticker) || compareText(a.month, b.month))
    .map(g => {
      const buy = roundCents(g.buy);
      const sell = roundCents(g.sell);
      return { ticker: g.ticker, year_month: g.month, buy_value: buy, sell_value: sell, net_value: roundCents(buy - sell) };
    });
}

/** NetFlow rows must already be sorted by (ticker, year_month) */
function buildCumulativeFlow(netFlow: NetFlow[]): CumulativeFlow[] {
  const rows: CumulativeFlow[] = [];
  let previous: CumulativeFlow | null = null;

  for (const row of netFlow) {
    const carry: CumulativeFlow | null = previous && previous.ticker === row.ticker ? previous : null;
    const current: CumulativeFlow = {
      ticker: row.ticker,
      year_month: row.year_month,
      cumulative_buy: roundCents((carry?.cumulative_buy ?? 0) + row.buy_value),
      cumulative_sell: roundCents((carry?.cumulative_sell ?? 0) + row.sell_value),
      cumulative_net: roundCents((carry?.cumulative_net ?? 0) + row.net_value),
    };
    rows.push(current);
    previous = current;
  }

  return rows;
}

function buildConfidence(directed: DirectedTransaction[]): Confidence[] {
  const totals = new Map<string, { buy: number; sell: number }>();
  for (const { txn, direction } of directed) {
    const t = totals.get(txn.ticker) ?? { buy: 0, sell: 0 };
    if (direction === 'BUY') t.buy += txn.total_value;
    else t.sell += txn.total_value;
    totals.set(txn.ticker, t);
  }

  return [...totals.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([ticker, t]) => {
      const buy = roundCents(t.buy);
      const sell = roundCents(t.sell);
      return {
        ticker,
        buy_value: buy,
        sell_value: sell,
        ratio: sell === 0 ? UNDEFINED_RATIO : Math.round((buy / sell) * 10000) / 10000,
      };
    });
}

/** Compares the two most recent cumulative periods of each ticker */
function buildRecentChange(cumulative: CumulativeFlow[]): RecentChange[] {
  const byTicker = new Map<string, CumulativeFlow[]>();
  for (const row of cumulative) {
    const rows = byTicker.get(row.ticker) ?? [];
    rows.push(row);
    byTicker.set(row.ticker, rows);
  }

  const result: RecentChange[] = [];
  for (const [ticker, rows] of byTicker) {
    if (rows.length < 2) continue;
    const latest = rows[rows.length - 1];
    const previous = rows[rows.length - 2];
    const change = roundCents(latest.cumulative_net - previous.cumulative_net);
    result.push({
      ticker,
      latest_period: latest.year_month,
      previous_period: previous.year_month,
      latest_net: latest.cumulative_net,
      previous_net: previous.cumulative_net,
      change,
      change_pct: previous.cumulative_net === 0
        ? null
        : Math.round((change / Math.abs(previous.cumulative_net)) * 1e6) / 1e6,
    });
  }
  return result;
}

function buildTickerSummary(sorted: Transaction[]): TickerSummary[] {
  const byTicker = new Map<string, Transaction[]>();
  for (const txn of sorted) {
    const rows = byTicker.get(txn.ticker) ?? [];
    rows.push(txn);
    byTicker.set(txn.ticker, rows);
  }

  return [...byTicker.entries()].map(([ticker, rows]) => {
    const filings = new Set(rows.map(r => r.accession_number)).size;
    const months = new Set(rows.map(r => yearMonth(r.transaction_date))).size;
    // rows are sorted by date within a ticker
    const earliest = rows[0].transaction_date;
    const latest = rows[rows.length - 1].transaction_date;
    return {
      ticker,
      filing_count: filings,
      transaction_count: rows.length,
      earliest_transaction: earliest,
      latest_transaction: latest,
      months_with_activity: months,
      activity_level: Math.round((filings / months) * 100) / 100,
      date_range_days: daysBetween(earliest, latest),
    };
  });
}

/** Filing activity per ticker and transaction month, all codes included */
function buildMonthlyActivity(sorted: Transaction[]): MonthlyActivity[] {
  const groups = new Map<string, { ticker: string; month: string; rows: Transaction[] }>();
  for (const txn of sorted) {
    const month = yearMonth(txn.transaction_date);
    const k = key(txn.ticker, month);
    let group = groups.get(k);
    if (!group) {
      group = { ticker: txn.ticker, month, rows: [] };
      groups.set(k, group);
    }
    group.rows.push(txn);
  }

  return [...groups.values()].map(({ ticker, month, rows }) => {
    const first = rows[0].transaction_date;
    const last = rows[rows.length - 1].transaction_date;
    return {
      ticker,
      year_month: month,
      filing_count: new Set(rows.map(r => r.accession_number)).size,
      first_transaction_date: first,
      last_transaction_date: last,
      transaction_date_range: daysBetween(first, last),
    };
  });
}

function daysBetween(from: string, to: string): number {
  const start = toEpochDay(from);
  const end = toEpochDay(to);
  return start === null || end === null ? 0 : end - start;
}

function groupTotals(
  directed: DirectedTransaction[],
  keyOf: (d: DirectedTransaction) => [string, string]
): Map<string, Totals> {
  const groups = new Map<string, Totals>();
  for (const d of directed) {
    const k = key(...keyOf(d));
    const totals = groups.get(k) ?? { value: 0, shares: 0 };
    totals.value += d.txn.total_value;
    totals.shares += d.txn.shares;
    groups.set(k, totals);
  }
  return groups;
}

function key(a: string, b: string): string {
  return `${a}\u0000${b}`;
}

function uniqueSorted(values: string[]): string[] {
  return [...new Set(values)].sort(compareText);
}

/** Plain code-unit order, independent of the host locale */
function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

function roundShares(value: number): number {
  return Math.round(value * 10000) / 10000;
}
