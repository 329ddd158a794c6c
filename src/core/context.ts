import { ArtifactRegistry } from './artifacts.js';
import { HttpCache } from './cache.js';
import { RateLimiter } from './rate-limiter.js';
import { SecClient, type FetchFn } from './sec-client.js';
import { silentLogger, type Logger } from './logger.js';
import type { Form4Config } from './config.js';
import type { Company } from './types.js';

/**
 * Everything a run mutates lives here, so two runs in one process
 * never share a CIK cache, limiter timestamp or dedup set.
 */
export interface RunContext {
  config: Form4Config;
  client: SecClient;
  limiter: RateLimiter;
  cache: HttpCache | null;
  logger: Logger;
  artifacts: ArtifactRegistry;
  /** ticker -> resolved company */
  companies: Map<string, Company>;
  /** SEC ticker directory, loaded on first resolution */
  directory: Map<string, Company> | null;
  /** accession number -> ticker that claimed it */
  seenAccessions: Map<string, string>;
}

export interface RunContextDeps {
  fetchFn?: FetchFn;
  logger?: Logger;
  /** Pass null to disable caching; omit to use config.cacheDb */
  cache?: HttpCache | null;
}

export function createRunContext(config: Form4Config, deps: RunContextDeps = {}): RunContext {
  const logger = deps.logger ?? silentLogger;
  const cache = deps.cache !== undefined
    ? deps.cache
    : config.cacheDb ? new HttpCache(config.cacheDb) : null;
  const limiter = new RateLimiter(config.requestsPerSecond);

  const client = new SecClient({
    userAgent: config.userAgent,
    limiter,
    maxRetries: config.maxRetries,
    backoffBaseMs: config.backoffBaseMs,
    timeoutMs: config.requestTimeoutMs,
    cache,
    fetchFn: deps.fetchFn,
    logger,
  });

  return {
    config,
    client,
    limiter,
    cache,
    logger,
    artifacts: new ArtifactRegistry(logger),
    companies: new Map(),
    directory: null,
    seenAccessions: new Map(),
  };
}
