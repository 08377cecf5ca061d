import type { Batch } from '../model/Batch.js';
import type { MaybePromise } from './MaybePromise.js';

/** Port for the record sink of a job. Same open/close rules as `RecordReader`. */
export interface RecordWriter<P = unknown> {
  open?(): MaybePromise<void>;
  /**
   * Write a whole batch. Called once per non-empty batch; there is no partial
   * batch write. A thrown error ends the job with status `FAILED`.
   */
  writeRecords(batch: Batch<P>): MaybePromise<void>;
  close?(): MaybePromise<void>;
}
