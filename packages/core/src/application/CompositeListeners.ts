import type { Batch } from '../domain/model/Batch.js';
import type { JobParameters } from '../domain/model/JobParameters.js';
import type { JobReport } from '../domain/model/JobReport.js';
import type { JobRecord } from '../domain/model/Record.js';
import type {
  JobListener,
  BatchListener,
  RecordReaderListener,
  RecordWriterListener,
  PipelineListener,
} from '../domain/ports/JobListeners.js';

/*
 * One composite per listener category. The job always talks to a composite:
 * an empty one is the no-op default, so the processing loop never checks for
 * a missing listener.
 */

export class CompositeJobListener implements Required<JobListener> {
  constructor(private readonly listeners: readonly JobListener[] = []) {}

  async beforeJobStart(parameters: JobParameters): Promise<void> {
    for (const listener of this.listeners) {
      await listener.beforeJobStart?.(parameters);
    }
  }

  async afterJobEnd(report: JobReport): Promise<void> {
    for (const listener of this.listeners) {
      await listener.afterJobEnd?.(report);
    }
  }
}

export class CompositeBatchListener<P> implements Required<BatchListener<P>> {
  constructor(private readonly listeners: readonly BatchListener<P>[] = []) {}

  async beforeBatchReading(): Promise<void> {
    for (const listener of this.listeners) {
      await listener.beforeBatchReading?.();
    }
  }

  async afterBatchProcessing(batch: Batch<P>): Promise<void> {
    for (const listener of this.listeners) {
      await listener.afterBatchProcessing?.(batch);
    }
  }

  async afterBatchWriting(batch: Batch<P>): Promise<void> {
    for (const listener of this.listeners) {
      await listener.afterBatchWriting?.(batch);
    }
  }

  async onBatchWritingException(batch: Batch<P>, error: unknown): Promise<void> {
    for (const listener of this.listeners) {
      await listener.onBatchWritingException?.(batch, error);
    }
  }
}

export class CompositeRecordReaderListener<P> implements Required<RecordReaderListener<P>> {
  constructor(private readonly listeners: readonly RecordReaderListener<P>[] = []) {}

  async beforeRecordReading(): Promise<void> {
    for (const listener of this.listeners) {
      await listener.beforeRecordReading?.();
    }
  }

  async afterRecordReading(record: JobRecord<P> | null): Promise<void> {
    for (const listener of this.listeners) {
      await listener.afterRecordReading?.(record);
    }
  }

  async onRecordReadingException(error: unknown): Promise<void> {
    for (const listener of this.listeners) {
      await listener.onRecordReadingException?.(error);
    }
  }
}

export class CompositeRecordWriterListener<P> implements Required<RecordWriterListener<P>> {
  constructor(private readonly listeners: readonly RecordWriterListener<P>[] = []) {}

  async beforeRecordWriting(batch: Batch<P>): Promise<void> {
    for (const listener of this.listeners) {
      await listener.beforeRecordWriting?.(batch);
    }
  }

  async afterRecordWriting(batch: Batch<P>): Promise<void> {
    for (const listener of this.listeners) {
      await listener.afterRecordWriting?.(batch);
    }
  }

  async onRecordWritingException(batch: Batch<P>, error: unknown): Promise<void> {
    for (const listener of this.listeners) {
      await listener.onRecordWritingException?.(batch, error);
    }
  }
}

export class CompositePipelineListener<I, O> implements Required<PipelineListener<I, O>> {
  constructor(private readonly listeners: readonly PipelineListener<I, O>[] = []) {}

  /** Threads the record through every listener; the first `null` vetoes it. */
  async beforeRecordProcessing(record: JobRecord<I>): Promise<JobRecord<I> | null> {
    let current = record;
    for (const listener of this.listeners) {
      if (!listener.beforeRecordProcessing) continue;
      const next = await listener.beforeRecordProcessing(current);
      if (next === null) return null;
      current = next;
    }
    return current;
  }

  async afterRecordProcessing(input: JobRecord<I>, output: JobRecord<O> | null): Promise<void> {
    for (const listener of this.listeners) {
      await listener.afterRecordProcessing?.(input, output);
    }
  }

  async onRecordProcessingException(record: JobRecord<I>, error: unknown): Promise<void> {
    for (const listener of this.listeners) {
      await listener.onRecordProcessingException?.(record, error);
    }
  }
}
