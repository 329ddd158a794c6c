import type { HttpCache } from './cache.js';
import type { RateLimiter } from './rate-limiter.js';
import { silentLogger, type Logger } from './logger.js';
import { SecApiError, NotFoundError, RateLimitError, RetryExhaustedError } from './errors.js';

/**
 * SEC EDGAR HTTP client.
 *
 * Every request waits on the shared rate limiter, including retries.
 * Transient failures (network, timeout, 429, 5xx) are retried with
 * exponential backoff and jitter; everything else fails immediately.
 */

export const SEC_BASE_URL = 'https://data.sec.gov';
export const SEC_ARCHIVES_URL = 'https://www.sec.gov/Archives/edgar/data';

export type FetchFn = (
  url: string,
  init: { headers: Record<string, string>; signal?: AbortSignal }
) => Promise<Response>;

export interface SecClientOptions {
  userAgent: string;
  limiter: RateLimiter;
  maxRetries?: number;
  backoffBaseMs?: number;
  timeoutMs?: number;
  cache?: HttpCache | null;
  fetchFn?: FetchFn;
  logger?: Logger;
}

export interface GetOptions {
  accept?: string;
  /** Omit to bypass the cache */
  cacheTtlHours?: number;
}

export class SecClient {
  private readonly userAgent: string;
  private readonly limiter: RateLimiter;
  private readonly maxRetries: number;
  private readonly backoffBaseMs: number;
  private readonly timeoutMs: number;
  private readonly cache: HttpCache | null;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;
  private requests = 0;

  constructor(options: SecClientOptions) {
    this.userAgent = options.userAgent;
    this.limiter = options.limiter;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.backoffBaseMs = options.backoffBaseMs ?? 1000;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.cache = options.cache ?? null;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? silentLogger;
  }

  /** Number of requests that went out on the wire */
  get requestCount(): number {
    return this.requests;
  }

  async get(url: string, options: GetOptions = {}): Promise<string> {
    if (!isHttpUrl(url)) {
      throw new SecApiError(`Invalid URL: ${url}`, 0, url);
    }

    const { accept = 'application/json', cacheTtlHours } = options;

    if (cacheTtlHours !== undefined && this.cache) {
      try {
        const cached = this.cache.get(url);
        if (cached !== null) return cached;
      } catch (err) {
        this.logger.debug(`Cache read failed for ${url}: ${describe(err)}`);
      }
    }

    let lastError: SecApiError | null = null;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      if (attempt > 0) {
        await sleep(this.backoffMs(attempt - 1));
      }
      await this.limiter.acquire();
      this.requests++;

      let response: Response;
      try {
        response = await this.fetchFn(url, {
          headers: {
            'User-Agent': this.userAgent,
            'Accept': accept,
          },
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
        lastError = new SecApiError(
          timedOut
            ? `Timed out after ${this.timeoutMs}ms fetching ${url}`
            : `Network error fetching ${url}: ${describe(err)}`,
          0,
          url
        );
        this.logger.debug(`${lastError.message} (attempt ${attempt + 1}/${this.maxRetries})`);
        continue;
      }

      if (response.ok) {
        const body = await response.text();
        if (cacheTtlHours !== undefined && this.cache) {
          try {
            this.cache.set(url, body, cacheTtlHours);
          } catch (err) {
            this.logger.debug(`Cache write failed for ${url}: ${describe(err)}`);
          }
        }
        return body;
      }

      if (response.status === 404) {
        throw new NotFoundError(url);
      }

      if (response.status === 429) {
        lastError = new RateLimitError(url);
      } else if (response.status >= 500) {
        lastError = new SecApiError(`SEC server error: ${response.status}`, response.status, url);
      } else if (response.status === 403) {
        throw new SecApiError(
          'SEC API rejected request (403 Forbidden). Check SEC_USER_AGENT — SEC requires a User-Agent with contact info.',
          403,
          url
        );
      } else {
        throw new SecApiError(
          `SEC API error: ${response.status} ${response.statusText}`,
          response.status,
          url
        );
      }
      this.logger.debug(`${lastError.message} for ${url} (attempt ${attempt + 1}/${this.maxRetries})`);
    }

    throw new RetryExhaustedError(
      url,
      this.maxRetries,
      lastError ?? new SecApiError(`Failed after ${this.maxRetries} retries`, 0, url)
    );
  }

  /** Exponential backoff with jitter: base, 2×base, 4×base, plus up to base/2 */
  private backoffMs(retry: number): number {
    const base = this.backoffBaseMs * Math.pow(2, retry);
    const jitter = Math.random() * (this.backoffBaseMs / 2);
    return base + jitter;
  }
}

/** Archive URL of one document inside a filing */
export function filingDocumentUrl(cik: string, accessionNumber: string, filename: string): string {
  const accessionNoDashes = accessionNumber.replace(/-/g, '');
  return `${SEC_ARCHIVES_URL}/${Number(cik)}/${accessionNoDashes}/${filename}`;
}

function isHttpUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'https:' || parsed.protocol === 'http:';
  } catch {
    return false;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}
