import type { JobRecord } from './Record.js';

/** A group of records read and processed in one cycle, then handed to the writer as a unit. */
export interface Batch<P = unknown> {
  /** Zero-based batch index within the job run. */
  readonly index: number;
  /** Records that survived processing, in read order. Never more than the configured batch size. */
  readonly records: readonly JobRecord<P>[];
}

export function createBatch<P>(index: number, records: readonly JobRecord<P>[]): Batch<P> {
  return { index, records };
}

export function batchSize(batch: Batch): number {
  return batch.records.length;
}

/** Empty batches are never handed to the writer. */
export function isEmptyBatch(batch: Batch): boolean {
  return batch.records.length === 0;
}
