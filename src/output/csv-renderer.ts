/**
 * Renders report tables as CSV for spreadsheet import.
 */

import { csvEscape } from './format-utils.js';
import type { Cell, ReportTable } from './report-tables.js';

export function renderCsv(table: ReportTable): string {
  const lines: string[] = [];

  lines.push(table.columns.map(csvEscape).join(','));

  for (const row of table.rows) {
    lines.push(row.map(cell => csvEscape(cellText(cell))).join(','));
  }

  return lines.join('\n') + '\n';
}

function cellText(cell: Cell): string {
  if (cell === null) return '';
  return typeof cell === 'number' ? cell.toString() : cell;
}
