/**
 * Writes a run's tables to the output directory.
 *
 * The transaction list is an intermediate artifact; aggregate tables,
 * failure listings and the consolidated JSON are the final report.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { StagingError } from '../core/errors.js';
import { renderCsv } from './csv-renderer.js';
import { renderReportJson, type ReportContent } from './json-renderer.js';
import {
  FLOW_TABLE_NAMES,
  failuresTable,
  flowTable,
  lineFailuresTable,
  transactionsTable,
  type ReportTable,
} from './report-tables.js';
import type { ArtifactRole } from '../core/artifacts.js';
import type { RunContext } from '../core/context.js';
import type { MarketFlowRow, ReportFile } from '../core/types.js';

/** 2024-03-05T14:07:09.123Z -> 20240305_140709 */
export function fileStamp(iso: string): string {
  return iso.slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
}

export async function writeReports(
  ctx: RunContext,
  content: ReportContent,
  marketFlows: readonly MarketFlowRow[] = []
): Promise<ReportFile[]> {
  const { outputDir, formats } = ctx.config;
  const stamp = fileStamp(content.started_at);
  const written: ReportFile[] = [];

  const write = async (table: string, filename: string, body: string, role: ArtifactRole) => {
    const path = join(outputDir, filename);
    try {
      await mkdir(outputDir, { recursive: true });
      if (role === 'final') ctx.artifacts.markFinal(path);
      else ctx.artifacts.track(path, role);
      await writeFile(path, body, 'utf8');
    } catch (err) {
      throw new StagingError(
        `Failed to write ${path}: ${err instanceof Error ? err.message : String(err)}`,
        path
      );
    }
    written.push({ table, path });
    ctx.logger.debug(`Wrote ${path}`);
  };

  if (formats.includes('csv')) {
    const csvTables: Array<{ table: ReportTable; role: ArtifactRole }> = [
      { table: transactionsTable(content.transactions), role: 'intermediate' },
      ...FLOW_TABLE_NAMES.map(name => ({ table: flowTable(content.tables, name), role: 'final' as const })),
      { table: failuresTable(content.failures), role: 'final' },
      { table: lineFailuresTable(content.line_failures), role: 'final' },
    ];
    for (const { table, role } of csvTables) {
      await write(table.name, `form4_${table.name}_${stamp}.csv`, renderCsv(table), role);
    }
  }

  if (formats.includes('json')) {
    await write('report', `form4_report_${stamp}.json`, renderReportJson(content, marketFlows), 'final');
  }

  return written;
}
