/**
 * Renders a run report and parsed transactions as terminal tables.
 */

import chalk from 'chalk';
import { formatNumber, formatValue, padRight, truncate } from './format-utils.js';
import { TRANSACTION_CODE_LABELS } from '../processing/form4-parser.js';
import type { Company, LineFailure, RunReport, RunStatus, Transaction } from '../core/types.js';

const STATUS_COLORS: Record<RunStatus, (text: string) => string> = {
  success: chalk.green,
  partial: chalk.yellow,
  failure: chalk.red,
};

export function renderRunSummary(report: RunReport): string {
  const lines: string[] = [];

  const header = `Form 4 Flow Report — ${report.tickers.map(t => t.ticker).join(', ') || 'no tickers'}`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');
  lines.push(`  Status: ${STATUS_COLORS[report.status](report.status.toUpperCase())}`);
  lines.push(`  Transactions: ${formatNumber(report.transactions.length)}  |  Failures: ${report.failures.length}  |  Line failures: ${report.line_failures.length}`);
  lines.push('');

  // Per-ticker progress
  lines.push('  ' + chalk.underline(
    padRight('Ticker', 10) +
    padRight('CIK', 14) +
    padRight('Filings', 10) +
    padRight('Parsed', 10) +
    padRight('Txns', 8)
  ));
  for (const t of report.tickers) {
    const ticker = t.failed ? chalk.red(t.ticker) : t.ticker;
    lines.push('  ' +
      padRight(ticker, 10) +
      padRight(t.cik ?? '--', 14) +
      padRight(String(t.filings_listed), 10) +
      padRight(String(t.filings_parsed), 10) +
      padRight(String(t.transactions), 8)
    );
  }
  lines.push('');

  const { net_flow, confidence, recent_change } = report.tables;

  if (net_flow.length > 0) {
    lines.push(chalk.bold('  Net Flow'));
    lines.push('  ' + chalk.underline(
      padRight('Ticker', 10) +
      padRight('Month', 10) +
      padRight('Buy', 12) +
      padRight('Sell', 12) +
      padRight('Net', 12)
    ));
    for (const row of net_flow) {
      const net = formatValue(row.net_value);
      lines.push('  ' +
        padRight(row.ticker, 10) +
        padRight(row.year_month, 10) +
        padRight(formatValue(row.buy_value), 12) +
        padRight(formatValue(row.sell_value), 12) +
        padRight(row.net_value >= 0 ? chalk.green(net) : chalk.red(net), 12)
      );
    }
    lines.push('');
  } else {
    lines.push(chalk.dim('  No open-market purchases or sales in the collected filings.'));
    lines.push('');
  }

  if (confidence.length > 0) {
    lines.push(chalk.bold('  Confidence (buy / sell)'));
    for (const row of confidence) {
      const ratio = typeof row.ratio === 'number' ? row.ratio.toFixed(4) : chalk.dim('n/a (no sells)');
      lines.push(`  ${padRight(row.ticker, 10)}${ratio}`);
    }
    lines.push('');
  }

  if (recent_change.length > 0) {
    lines.push(chalk.bold('  Recent Change'));
    for (const row of recent_change) {
      const pct = row.change_pct === null ? '' : ` (${row.change_pct >= 0 ? '+' : ''}${(row.change_pct * 100).toFixed(1)}%)`;
      lines.push(`  ${padRight(row.ticker, 10)}${row.previous_period} -> ${row.latest_period}: ${formatValue(row.change)}${pct}`);
    }
    lines.push('');
  }

  if (report.failures.length > 0) {
    lines.push(chalk.bold.red('  Failures'));
    for (const f of report.failures) {
      const where = f.accession_number ? `${f.ticker} ${f.accession_number}` : f.ticker;
      lines.push(`  ${chalk.red(padRight(f.kind, 18))}${padRight(where, 32)}${chalk.dim(truncate(f.reason, 60))}`);
    }
    lines.push('');
  }

  if (report.reports.length > 0) {
    lines.push(chalk.dim('  -- Files ' + '-'.repeat(50)));
    for (const file of report.reports) {
      lines.push(chalk.dim(`  ${padRight(file.table, 18)}${file.path}`));
    }
    if (report.cleanup.deleted > 0) {
      lines.push(chalk.dim(`  Removed ${report.cleanup.deleted} intermediate file(s)`));
    }
  }

  return lines.join('\n');
}

export function renderTransactions(transactions: readonly Transaction[], lineFailures: readonly LineFailure[] = []): string {
  const lines: string[] = [];

  if (transactions.length === 0) {
    lines.push(chalk.dim('  No transactions extracted.'));
  } else {
    const cols = { date: 12, ticker: 8, reporter: 24, type: 20, shares: 14, price: 12, value: 12 };
    lines.push('  ' + chalk.underline(
      padRight('Date', cols.date) +
      padRight('Ticker', cols.ticker) +
      padRight('Reporter', cols.reporter) +
      padRight('Type', cols.type) +
      padRight('Shares', cols.shares) +
      padRight('Price', cols.price) +
      padRight('Value', cols.value)
    ));

    for (const txn of transactions) {
      const label = truncate(TRANSACTION_CODE_LABELS[txn.transaction_code], cols.type - 2);
      const typeColored = txn.transaction_code === 'P' ? chalk.green(label)
        : txn.transaction_code === 'S' ? chalk.red(label)
        : chalk.dim(label);
      const date = txn.anomalies.length > 0 ? chalk.yellow(txn.transaction_date) : txn.transaction_date;

      lines.push('  ' +
        padRight(date, cols.date) +
        padRight(txn.ticker, cols.ticker) +
        padRight(truncate(txn.reporter_name, cols.reporter - 2), cols.reporter) +
        padRight(typeColored, cols.type) +
        padRight(formatNumber(txn.shares), cols.shares) +
        padRight(`$${txn.price_per_share.toFixed(2)}`, cols.price) +
        padRight(formatValue(txn.total_value), cols.value)
      );
    }
  }

  if (lineFailures.length > 0) {
    lines.push('');
    lines.push(chalk.yellow(`  ${lineFailures.length} line(s) could not be extracted:`));
    for (const f of lineFailures) {
      lines.push(chalk.dim(`  ${f.accession_number} ${f.table}[${f.line}]: ${f.reason}`));
    }
  }

  return lines.join('\n');
}

export function renderCompanies(companies: readonly Company[]): string {
  return companies
    .map(c => `  ${chalk.cyan(padRight(c.ticker, 8))} ${padRight(c.cik, 12)} ${c.name}`)
    .join('\n');
}
