/**
 * Error taxonomy for ingestion
 *
 * All of these are contained where they occur and surface only as log
 * entries and cycle summary counters. ConfigError is the exception: it is
 * raised at startup and is fatal.
 *
 * A robots.txt disallow is not an error and has no class here; the page
 * fetcher reports it as a { status: 'disallowed' } outcome instead.
 */

export class NetworkError extends Error {
  cause?: Error;
  url?: string;
  status?: number;

  constructor(message: string, options: { url?: string; status?: number; cause?: Error } = {}) {
    super(message);
    this.name = 'NetworkError';
    this.url = options.url;
    this.status = options.status;
    this.cause = options.cause;
  }
}

export class ParseError extends Error {
  cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ParseError';
    this.cause = cause;
  }
}

export class ValidationError extends Error {
  field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class StoreError extends Error {
  cause?: Error;
  /** Driver error code, e.g. "23505" for a unique violation */
  code?: string;

  constructor(message: string, options: { code?: string; cause?: Error } = {}) {
    super(message);
    this.name = 'StoreError';
    this.code = options.code;
    this.cause = options.cause;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Message for logs and summaries from anything that was thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name && error.name !== 'Error'
      ? `${error.name}: ${error.message}`
      : error.message;
  }
  return String(error);
}
