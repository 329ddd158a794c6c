import { z } from 'zod';
import { join } from 'node:path';
import { ConfigError } from './errors.js';

/**
 * Run configuration: environment variables, overridden by CLI flags,
 * validated in one place.
 */

const DEFAULT_USER_AGENT = 'form4-flow contact@example.com';

const positiveInt = z.coerce.number().int().positive();

export const ConfigSchema = z.object({
  userAgent: z.string().trim().min(6, 'must include contact info'),
  outputDir: z.string().min(1),
  cacheDb: z.string().min(1).nullable(),
  requestsPerSecond: z.coerce.number().positive().max(10, 'SEC allows at most 10 requests per second'),
  maxRetries: positiveInt.max(10),
  backoffBaseMs: z.coerce.number().int().nonnegative(),
  requestTimeoutMs: positiveInt,
  filingsPerTicker: positiveInt,
  fetchConcurrency: positiveInt.max(10),
  maxConsecutiveFailures: positiveInt.nullable(),
  sinceDays: positiveInt.nullable(),
  keepIntermediate: z.boolean(),
  formats: z.array(z.enum(['csv', 'json'])).min(1),
  cikOverrides: z.record(z.string(), z.string().regex(/^\d{1,10}$/, 'CIK must be numeric')),
});

export type Form4Config = z.infer<typeof ConfigSchema>;

export type ConfigInput = { [K in keyof Form4Config]?: unknown };

export function defaultConfig(env: NodeJS.ProcessEnv = process.env): ConfigInput {
  return {
    userAgent: env.SEC_USER_AGENT || DEFAULT_USER_AGENT,
    outputDir: env.FORM4_OUTPUT_DIR || join('data', 'us_market'),
    cacheDb: env.FORM4_CACHE_DB || null,
    requestsPerSecond: env.FORM4_REQUESTS_PER_SECOND || 10,
    maxRetries: env.FORM4_MAX_RETRIES || 3,
    backoffBaseMs: 1000,
    requestTimeoutMs: 30_000,
    filingsPerTicker: 10,
    fetchConcurrency: 5,
    maxConsecutiveFailures: null,
    sinceDays: null,
    keepIntermediate: false,
    formats: ['csv', 'json'],
    cikOverrides: {},
  };
}

/**
 * Merge overrides onto the environment defaults and validate.
 * Undefined overrides leave the default in place.
 */
export function loadConfig(overrides: ConfigInput = {}, env: NodeJS.ProcessEnv = process.env): Form4Config {
  const merged: ConfigInput = { ...defaultConfig(env) };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return parsed.data;
}
