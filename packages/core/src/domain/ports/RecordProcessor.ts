import type { JobRecord } from '../model/Record.js';
import type { MaybePromise } from './MaybePromise.js';

/**
 * Transforms or filters one record.
 *
 * Return `null` to filter the record out. A thrown error marks this record as
 * failed and counts against the job's error threshold; the job goes on with
 * the next record while the threshold holds.
 */
export interface RecordProcessor<I = unknown, O = I> {
  processRecord(record: JobRecord<I>): MaybePromise<JobRecord<O> | null>;
}
