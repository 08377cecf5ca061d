import type { JobRecord } from '../model/Record.js';
import type { MaybePromise } from './MaybePromise.js';

/**
 * Port for the record source of a job.
 *
 * The job opens the reader before the first read and closes it on every exit
 * path, including when opening it (or the writer) failed.
 */
export interface RecordReader<P = unknown> {
  /** Acquire the underlying resource. A failure ends the job with status `FAILED`. */
  open?(): MaybePromise<void>;
  /**
   * Return the next record, or `null` once the source is exhausted.
   * A thrown error ends the job with status `FAILED`.
   */
  readRecord(): MaybePromise<JobRecord<P> | null>;
  /** Release the underlying resource. Failures are recorded on the report but do not change the job outcome. */
  close?(): MaybePromise<void>;
}
