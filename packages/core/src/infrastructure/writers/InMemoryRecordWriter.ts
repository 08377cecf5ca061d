import type { Batch } from '../../domain/model/Batch.js';
import type { JobRecord } from '../../domain/model/Record.js';
import type { RecordWriter } from '../../domain/ports/RecordWriter.js';

/** Keeps every written batch in memory. Handy for tests and small jobs. */
export class InMemoryRecordWriter<P> implements RecordWriter<P> {
  private readonly batches: Batch<P>[] = [];

  writeRecords(batch: Batch<P>): void {
    this.batches.push(batch);
  }

  /** Batches in write order. */
  getBatches(): readonly Batch<P>[] {
    return this.batches;
  }

  getRecords(): readonly JobRecord<P>[] {
    return this.batches.flatMap((batch) => batch.records);
  }

  getPayloads(): readonly P[] {
    return this.getRecords().map((record) => record.payload);
  }
}
