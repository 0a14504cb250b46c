import type { SourceName } from '@countryfx/types';

export type ErrorEnvelope = {
  error: string;
  details?: unknown;
};

export function errorResponse(message: string, details?: unknown): ErrorEnvelope {
  return { error: message, ...(details === undefined ? {} : { details }) };
}

const STATUS_MESSAGE_MAP: Record<number, string> = {
  400: 'Validation failed',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not found',
  409: 'Conflict',
  429: 'Too many requests',
  500: 'Internal server error',
  503: 'Service unavailable',
};

export function errorResponseForStatus(status: number, details?: unknown): ErrorEnvelope {
  return errorResponse(STATUS_MESSAGE_MAP[status] ?? 'Request failed', details);
}

const SOURCE_LABELS: Record<SourceName, string> = {
  countries: 'restcountries',
  exchange_rates: 'exchange rates',
};

/** Base class for every failure raised by the refresh pipeline. */
export class PipelineError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class SourceUnavailableError extends PipelineError {
  readonly source: SourceName;

  constructor(source: SourceName, reason: string, options?: { cause?: unknown }) {
    super(
      `Could not fetch data from ${SOURCE_LABELS[source]} API: ${reason}`,
      'ERR_SOURCE_UNAVAILABLE',
      503,
      options
    );
    this.source = source;
  }

  /** Public envelope returned to the trigger when precheck fails. */
  toResponse(): ErrorEnvelope {
    return errorResponse(
      'External data source unavailable',
      `Could not fetch data from ${SOURCE_LABELS[this.source]} API`
    );
  }
}

export type PersistenceProgress = {
  chunkIndex: number;
  chunkCount: number;
  persistedRecords: number;
  affectedBeforeFailure: number;
};

/**
 * Raised when a chunk upsert fails. Chunks before `chunkIndex` are already
 * committed and are not rolled back.
 */
export class PersistenceError extends PipelineError {
  readonly progress: PersistenceProgress;

  constructor(progress: PersistenceProgress, options?: { cause?: unknown }) {
    super(
      `Upsert failed on chunk ${progress.chunkIndex + 1}/${progress.chunkCount} ` +
        `after ${progress.persistedRecords} records`,
      'ERR_PERSISTENCE',
      500,
      options
    );
    this.progress = progress;
  }
}

export class ReportError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ERR_REPORT', 500, options);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
