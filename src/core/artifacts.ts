import { readdir, rm, rmdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { silentLogger, type Logger } from './logger.js';

/**
 * Registry of files written during a run, tagged by role.
 *
 * finalize(false) deletes every `intermediate` path and keeps `final`
 * ones; the decision depends only on the tag, never on the file name.
 */

export type ArtifactRole = 'intermediate' | 'final';

export interface FinalizeReport {
  deleted: string[];
  retained: string[];
  failures: Array<{ path: string; reason: string }>;
}

export class ArtifactRegistry {
  private readonly roles = new Map<string, ArtifactRole>();

  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Register a path. A path already marked final stays final.
   */
  track(path: string, role: ArtifactRole = 'intermediate'): void {
    const key = resolve(path);
    if (this.roles.get(key) === 'final') return;
    this.roles.set(key, role);
  }

  markFinal(path: string): void {
    this.roles.set(resolve(path), 'final');
  }

  roleOf(path: string): ArtifactRole | undefined {
    return this.roles.get(resolve(path));
  }

  paths(role?: ArtifactRole): string[] {
    return [...this.roles.entries()]
      .filter(([, r]) => role === undefined || r === role)
      .map(([p]) => p)
      .sort();
  }

  get size(): number {
    return this.roles.size;
  }

  async finalize(keepIntermediate: boolean): Promise<FinalizeReport> {
    const report: FinalizeReport = { deleted: [], retained: [], failures: [] };

    if (keepIntermediate) {
      report.retained = this.paths();
      this.logger.debug(`Keeping ${report.retained.length} tracked file(s)`);
      return report;
    }

    report.retained = this.paths('final');
    const parents = new Set<string>();

    for (const path of this.paths('intermediate')) {
      try {
        await rm(path);
        report.deleted.push(path);
        parents.add(dirname(path));
        this.roles.delete(path);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        report.failures.push({ path, reason });
        this.logger.warn(`Could not delete ${path}: ${reason}`);
      }
    }

    // Directories that held only intermediates (e.g. filings/) go too
    const finalDirs = new Set(report.retained.map(p => dirname(p)));
    for (const dir of parents) {
      if (finalDirs.has(dir)) continue;
      try {
        if ((await readdir(dir)).length === 0) await rmdir(dir);
      } catch (err) {
        this.logger.debug(`Left directory ${dir} in place: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    this.logger.debug(`Deleted ${report.deleted.length} intermediate file(s), kept ${report.retained.length}`);
    return report;
  }
}
