/**
 * Custom error types for SEC EDGAR interactions and the Form 4 pipeline.
 * Enables callers to handle different failure modes appropriately.
 */

import type { FailureKind } from './types.js';

export class SecApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(message);
    this.name = 'SecApiError';
  }
}

export class NotFoundError extends SecApiError {
  constructor(url: string, detail: string = '') {
    super(
      `Not found: ${detail || url}`,
      404,
      url
    );
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends SecApiError {
  constructor(url: string) {
    super(
      'SEC API rate limit exceeded. Requests are throttled to the SEC fair access policy; wait a moment and retry.',
      429,
      url
    );
    this.name = 'RateLimitError';
  }
}

/** Transient failures (network, timeout, 429, 5xx) persisted through every attempt */
export class RetryExhaustedError extends SecApiError {
  constructor(url: string, public readonly attempts: number, public readonly lastError: SecApiError) {
    super(
      `Gave up after ${attempts} attempts: ${lastError.message}`,
      lastError.statusCode,
      url
    );
    this.name = 'RetryExhaustedError';
  }
}

export class DataParseError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'DataParseError';
  }
}

/**
 * Base class for failures that are recorded in a run report
 * instead of aborting the run.
 */
export abstract class PipelineError extends Error {
  abstract readonly kind: FailureKind;

  constructor(
    message: string,
    public readonly ticker: string,
    public readonly accessionNumber: string | null = null
  ) {
    super(message);
  }
}

export class UnknownTickerError extends PipelineError {
  readonly kind = 'UnknownTicker' as const;

  constructor(ticker: string) {
    super(
      ticker.trim()
        ? `Could not find a CIK for ticker "${ticker}".`
        : 'Ticker must be a non-empty string.',
      ticker
    );
    this.name = 'UnknownTickerError';
  }
}

export class IndexUnavailableError extends PipelineError {
  readonly kind = 'IndexUnavailable' as const;

  constructor(ticker: string, public readonly lastError: Error) {
    super(`Filing index unavailable for ${ticker}: ${lastError.message}`, ticker);
    this.name = 'IndexUnavailableError';
  }
}

export class FilingNotFoundError extends PipelineError {
  readonly kind = 'FilingNotFound' as const;

  constructor(ticker: string, accessionNumber: string, public readonly url: string) {
    super(`Filing ${accessionNumber} not found at ${url}`, ticker, accessionNumber);
    this.name = 'FilingNotFoundError';
  }
}

export class FetchFailedError extends PipelineError {
  readonly kind = 'FetchFailed' as const;

  constructor(ticker: string, accessionNumber: string, public readonly lastError: Error) {
    super(`Failed to fetch filing ${accessionNumber}: ${lastError.message}`, ticker, accessionNumber);
    this.name = 'FetchFailedError';
  }
}

export class MalformedFilingError extends PipelineError {
  readonly kind = 'MalformedFiling' as const;

  constructor(ticker: string, accessionNumber: string, public readonly reason: string) {
    super(`Malformed filing ${accessionNumber}: ${reason}`, ticker, accessionNumber);
    this.name = 'MalformedFilingError';
  }
}

/** Staging storage is unusable. Fatal for the whole run. */
export class StagingError extends Error {
  constructor(message: string, public readonly path: string) {
    super(message);
    this.name = 'StagingError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}
