import {
  FLOW_TABLE_NAMES,
  failuresTable,
  flowTable,
  lineFailuresTable,
  tableRecords,
  transactionsTable,
} from './report-tables.js';
import type { MarketFlowRow, RunReport } from '../core/types.js';

/**
 * Renders a run as one consolidated JSON document for programmatic use.
 * Tables use the same column order as the CSV output.
 */

export type ReportContent = Omit<RunReport, 'reports' | 'cleanup'>;

export function renderReportJson(report: ReportContent, marketFlows: readonly MarketFlowRow[] = []): string {
  const tables: Record<string, unknown> = {};
  for (const name of FLOW_TABLE_NAMES) {
    tables[name] = tableRecords(flowTable(report.tables, name));
  }

  return JSON.stringify({
    status: report.status,
    started_at: report.started_at,
    finished_at: report.finished_at,
    tickers: report.tickers,
    tables,
    transactions: tableRecords(transactionsTable(report.transactions)),
    failures: tableRecords(failuresTable(report.failures)),
    line_failures: tableRecords(lineFailuresTable(report.line_failures)),
    ...(marketFlows.length > 0 ? { market_flows: marketFlows } : {}),
  }, null, 2);
}
