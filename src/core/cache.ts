import Database from 'better-sqlite3';
import { createHash } from 'node:crypto';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync, rmSync } from 'node:fs';

/**
 * SQLite cache for SEC EDGAR responses.
 * Caches at the HTTP response level to avoid redundant API calls.
 *
 * If the DB cannot be opened it is deleted and recreated; a lost
 * cache only means re-fetching from SEC.
 */

export const DEFAULT_CACHE_DB = join(homedir(), '.form4-flow', 'cache.db');

const MEM_CACHE_MAX = 100;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS http_cache (
    url_hash TEXT PRIMARY KEY,
    url TEXT NOT NULL,
    response_body TEXT NOT NULL,
    fetched_at TEXT NOT NULL,
    expires_at TEXT NOT NULL
  )
`;

export interface CacheStats {
  entries: number;
  sizeBytes: number;
  location: string;
}

export class HttpCache {
  private db: Database.Database | null = null;
  /** In-memory FIFO cache for hot-path hits within a run */
  private readonly memCache = new Map<string, { body: string; expiresAt: number }>();

  constructor(readonly dbPath: string = DEFAULT_CACHE_DB) {}

  private getDb(): Database.Database {
    if (this.db) return this.db;

    mkdirSync(dirname(this.dbPath), { recursive: true });

    try {
      this.db = open(this.dbPath);
    } catch {
      // Corrupted DB: delete and recreate
      for (const suffix of ['', '-wal', '-shm']) {
        rmSync(this.dbPath + suffix, { force: true });
      }
      this.db = open(this.dbPath);
    }

    return this.db;
  }

  /** Get cached response if still valid */
  get(url: string): string | null {
    const hash = hashUrl(url);
    const now = Date.now();

    const mem = this.memCache.get(hash);
    if (mem && mem.expiresAt > now) return mem.body;

    const row = this.getDb().prepare(
      'SELECT response_body, expires_at FROM http_cache WHERE url_hash = ? AND expires_at > ?'
    ).get(hash, new Date(now).toISOString()) as { response_body: string; expires_at: string } | undefined;

    if (row) {
      this.setMem(hash, row.response_body, new Date(row.expires_at).getTime());
      return row.response_body;
    }

    return null;
  }

  /** Store response in cache */
  set(url: string, body: string, ttlHours: number = 24): void {
    const hash = hashUrl(url);
    const now = new Date();
    const expiresAt = now.getTime() + ttlHours * 60 * 60 * 1000;

    this.setMem(hash, body, expiresAt);

    this.getDb().prepare(`
      INSERT OR REPLACE INTO http_cache (url_hash, url, response_body, fetched_at, expires_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(hash, url, body, now.toISOString(), new Date(expiresAt).toISOString());
  }

  clear(): void {
    this.memCache.clear();
    this.getDb().exec('DELETE FROM http_cache');
  }

  stats(): CacheStats {
    const row = this.getDb().prepare(
      'SELECT COUNT(*) as count, COALESCE(SUM(LENGTH(response_body)), 0) as size FROM http_cache'
    ).get() as { count: number; size: number };
    return { entries: row.count, sizeBytes: row.size, location: this.dbPath };
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private setMem(hash: string, body: string, expiresAt: number): void {
    if (this.memCache.size >= MEM_CACHE_MAX) {
      const firstKey = this.memCache.keys().next().value;
      if (firstKey !== undefined) this.memCache.delete(firstKey);
    }
    this.memCache.set(hash, { body, expiresAt });
  }
}

function open(path: string): Database.Database {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 3000');
  db.exec(SCHEMA);
  return db;
}

function hashUrl(url: string): string {
  return createHash('sha256').update(url).digest('hex');
}
