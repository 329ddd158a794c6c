/**
 * Downloads Form 4 documents and stages them on disk.
 *
 * Every request shares the run's rate limiter through the SEC client.
 * Staged files are registered as intermediate artifacts.
 */

import { access, mkdir, writeFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import { join } from 'node:path';
import {
  FetchFailedError,
  FilingNotFoundError,
  RetryExhaustedError,
  SecApiError,
  StagingError,
} from '../core/errors.js';
import { extractOwnershipDocument } from './form4-parser.js';
import type { RunContext } from '../core/context.js';
import type { FilingRef, RawFiling } from '../core/types.js';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

export function stagingDir(ctx: RunContext): string {
  return join(ctx.config.outputDir, 'filings');
}

/**
 * Make sure the staging directory exists and is writable.
 * Throws StagingError, which halts the run.
 */
export async function prepareStaging(ctx: RunContext): Promise<string> {
  const dir = stagingDir(ctx);
  try {
    await mkdir(dir, { recursive: true });
    await access(dir, constants.W_OK);
  } catch (err) {
    throw new StagingError(
      `Staging directory ${dir} is not writable: ${err instanceof Error ? err.message : String(err)}`,
      dir
    );
  }
  return dir;
}

/**
 * Fetch one filing document.
 *
 * Throws FilingNotFoundError for 404s and other non-retryable responses,
 * FetchFailedError once transient failures exhaust the retry budget, and
 * StagingError when the document can't be written to disk.
 */
export async function fetchFiling(ctx: RunContext, ref: FilingRef): Promise<RawFiling> {
  let body: string;
  try {
    body = await ctx.client.get(ref.documentUrl, {
      accept: 'application/xml, text/xml, text/plain',
      cacheTtlHours: 720, // filings are immutable
    });
  } catch (err) {
    if (err instanceof RetryExhaustedError) {
      throw new FetchFailedError(ref.ticker, ref.accessionNumber, err.lastError);
    }
    if (err instanceof SecApiError) {
      throw new FilingNotFoundError(ref.ticker, ref.accessionNumber, ref.documentUrl);
    }
    throw new FetchFailedError(ref.ticker, ref.accessionNumber, err instanceof Error ? err : new Error(String(err)));
  }

  // Full submission text files wrap the XML in SGML headers
  const doc = extractOwnershipDocument(body);
  const staged = doc && !body.trimStart().startsWith('<?xml') && !body.trimStart().startsWith('<ownershipDocument')
    ? XML_DECLARATION + doc
    : body;

  const stagedPath = await stageFiling(ctx, ref.accessionNumber, staged);
  return { ref, body: staged, retrievedAt: new Date().toISOString(), stagedPath };
}

export async function stageFiling(ctx: RunContext, accessionNumber: string, body: string): Promise<string> {
  const dir = stagingDir(ctx);
  const path = join(dir, `${accessionNumber}.xml`);
  try {
    await mkdir(dir, { recursive: true });
    ctx.artifacts.track(path);
    await writeFile(path, body, 'utf8');
  } catch (err) {
    throw new StagingError(
      `Failed to stage filing ${accessionNumber}: ${err instanceof Error ? err.message : String(err)}`,
      path
    );
  }
  return path;
}
