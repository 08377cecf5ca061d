import type { Batch } from '../model/Batch.js';
import type { JobParameters } from '../model/JobParameters.js';
import type { JobReport } from '../model/JobReport.js';
import type { JobRecord } from '../model/Record.js';
import type { MaybePromise } from './MaybePromise.js';

/**
 * Listener capabilities, one interface per phase of a job run.
 *
 * All methods are optional. Listeners of a category are invoked in
 * registration order, one after the other, and each returned promise is
 * awaited before the job moves on. Errors thrown from a listener are not
 * caught specially: a throwing listener fails the step it is part of. The
 * `on...Exception` callbacks let observers react to failures without taking
 * part in error counting.
 */

/** Job-level notifications. */
export interface JobListener {
  beforeJobStart?(parameters: JobParameters): MaybePromise<void>;
  /** Called with the final, read-only report. */
  afterJobEnd?(report: JobReport): MaybePromise<void>;
}

/** Batch-level notifications. */
export interface BatchListener<P = unknown> {
  beforeBatchReading?(): MaybePromise<void>;
  /** Called with the batch built by one read cycle, possibly empty. */
  afterBatchProcessing?(batch: Batch<P>): MaybePromise<void>;
  afterBatchWriting?(batch: Batch<P>): MaybePromise<void>;
  onBatchWritingException?(batch: Batch<P>, error: unknown): MaybePromise<void>;
}

/** Notifications around each call to the reader. */
export interface RecordReaderListener<P = unknown> {
  beforeRecordReading?(): MaybePromise<void>;
  /** `record` is `null` when the reader signalled the end of the source. */
  afterRecordReading?(record: JobRecord<P> | null): MaybePromise<void>;
  onRecordReadingException?(error: unknown): MaybePromise<void>;
}

/** Notifications around each call to the writer. */
export interface RecordWriterListener<P = unknown> {
  beforeRecordWriting?(batch: Batch<P>): MaybePromise<void>;
  afterRecordWriting?(batch: Batch<P>): MaybePromise<void>;
  onRecordWritingException?(batch: Batch<P>, error: unknown): MaybePromise<void>;
}

/**
 * Hooks around the processing of each record.
 *
 * Pipeline order:
 * 1. Record read from the source
 * 2. **`beforeRecordProcessing`**: may replace the record, or return `null` to filter it
 * 3. Processor
 * 4. **`afterRecordProcessing`**: receives the input record and the processor's output (`null` when filtered)
 *
 * An error thrown by either hook is handled like a processor error.
 */
export interface PipelineListener<I = unknown, O = unknown> {
  beforeRecordProcessing?(record: JobRecord<I>): MaybePromise<JobRecord<I> | null>;
  afterRecordProcessing?(input: JobRecord<I>, output: JobRecord<O> | null): MaybePromise<void>;
  onRecordProcessingException?(record: JobRecord<I>, error: unknown): MaybePromise<void>;
}
