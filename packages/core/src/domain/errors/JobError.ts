import type { Batch } from '../model/Batch.js';
import type { JobRecord } from '../model/Record.js';
import { describeRecord } from '../model/Record.js';

/**
 * Failure categories a job run can encounter.
 *
 * Only `process-failure` and `close-failure` are recoverable; every other kind
 * ends the run with status `FAILED`.
 */
export type JobErrorKind =
  | 'open-failure'
  | 'read-failure'
  | 'process-failure'
  | 'error-threshold-exceeded'
  | 'write-failure'
  | 'close-failure'
  | 'listener-failure';

/** Resource whose lifecycle the job drives. */
export type JobResource = 'reader' | 'writer';

/** Plain-object form of a `JobError`, as carried by report snapshots. */
export interface SerializedJobError {
  readonly name: string;
  readonly kind: JobErrorKind;
  readonly message: string;
  readonly cause?: string;
}

/**
 * Base class of every error the engine records on a job report.
 *
 * `kind` lets callers branch on the failure category without inspecting
 * messages; `cause` holds whatever the reader, processor, writer or listener
 * threw.
 *
 * @example
 * ```typescript
 * const report = await job.call();
 * if (report.lastError?.kind === 'write-failure') {
 *   console.error('sink rejected a batch', report.lastError.cause);
 * }
 * ```
 */
export class JobError extends Error {
  readonly kind: JobErrorKind;

  constructor(message: string, kind: JobErrorKind, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'JobError';
    this.kind = kind;
  }

  toJSON(): SerializedJobError {
    const cause = this.cause;
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      ...(cause !== undefined ? { cause: cause instanceof Error ? cause.message : String(cause) } : {}),
    };
  }
}

export class ResourceOpeningError extends JobError {
  readonly resource: JobResource;

  constructor(resource: JobResource, cause: unknown) {
    super(`Unable to open record ${resource}`, 'open-failure', { cause });
    this.name = 'ResourceOpeningError';
    this.resource = resource;
  }
}

export class ResourceClosingError extends JobError {
  readonly resource: JobResource;

  constructor(resource: JobResource, cause: unknown) {
    super(`Unable to close record ${resource}`, 'close-failure', { cause });
    this.name = 'ResourceClosingError';
    this.resource = resource;
  }
}

export class RecordReadingError extends JobError {
  constructor(cause: unknown) {
    super('Unable to read next record', 'read-failure', { cause });
    this.name = 'RecordReadingError';
  }
}

export class RecordProcessingError extends JobError {
  readonly record: JobRecord;

  constructor(record: JobRecord, cause: unknown) {
    super(`Unable to process ${describeRecord(record)}`, 'process-failure', { cause });
    this.name = 'RecordProcessingError';
    this.record = record;
  }
}

export class ErrorThresholdExceededError extends JobError {
  readonly errorCount: number;
  readonly errorThreshold: number;

  constructor(errorCount: number, errorThreshold: number, cause: RecordProcessingError) {
    super(
      `Error threshold exceeded (${String(errorCount)} > ${String(errorThreshold)}). Aborting execution`,
      'error-threshold-exceeded',
      { cause },
    );
    this.name = 'ErrorThresholdExceededError';
    this.errorCount = errorCount;
    this.errorThreshold = errorThreshold;
  }
}

export class BatchWritingError extends JobError {
  readonly batch: Batch;

  constructor(batch: Batch, cause: unknown) {
    super(`Unable to write batch #${String(batch.index)} of ${String(batch.records.length)} records`, 'write-failure', {
      cause,
    });
    this.name = 'BatchWritingError';
    this.batch = batch;
  }
}

/** Thrown on misuse of the engine: invalid status transition, mutation of a finished report, second run. */
export class IllegalStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IllegalStateError';
  }
}

/** Wrap anything caught at the job boundary into a `JobError`. */
export function toJobError(error: unknown): JobError {
  if (error instanceof JobError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new JobError(`Job listener failed: ${message}`, 'listener-failure', { cause: error });
}
