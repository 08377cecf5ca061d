import type { Batch } from '../../domain/model/Batch.js';
import type { JobRecord } from '../../domain/model/Record.js';
import { createBatch } from '../../domain/model/Batch.js';
import { describeRecord } from '../../domain/model/Record.js';
import {
  RecordReadingError,
  RecordProcessingError,
  ErrorThresholdExceededError,
} from '../../domain/errors/JobError.js';
import type { JobContext } from '../JobContext.js';

/** Use case: read up to `batchSize` records and run each one through the pipeline. */
export class ReadAndProcessBatch<I, O> {
  constructor(private readonly ctx: JobContext<I, O>) {}

  async execute(): Promise<Batch<O>> {
    const records: JobRecord<O>[] = [];
    await this.ctx.batchListener.beforeBatchReading();

    for (let i = 0; i < this.ctx.parameters.batchSize; i++) {
      const record = await this.readRecord();
      if (record === null) {
        this.ctx.tracker.noMoreRecords();
        break;
      }
      await this.processRecord(record, records);
    }

    const batch = createBatch(this.ctx.nextBatchIndex(), records);
    await this.ctx.batchListener.afterBatchProcessing(batch);
    return batch;
  }

  private async readRecord(): Promise<JobRecord<I> | null> {
    try {
      this.ctx.logger.debug({ event: 'record_reading' }, 'Reading next record');
      await this.ctx.readerListener.beforeRecordReading();
      const record = await this.ctx.reader.readRecord();
      if (record !== null) {
        this.ctx.metrics.incrementReadCount();
      }
      await this.ctx.readerListener.afterRecordReading(record);
      return record;
    } catch (error) {
      await this.ctx.readerListener.onRecordReadingException(error);
      throw new RecordReadingError(error);
    }
  }

  private async processRecord(record: JobRecord<I>, batch: JobRecord<O>[]): Promise<void> {
    try {
      this.ctx.logger.debug({ event: 'record_processing', number: record.header.number }, `Processing ${describeRecord(record)}`);
      let processed: JobRecord<O> | null = null;

      const preProcessed = await this.ctx.pipelineListener.beforeRecordProcessing(record);
      if (preProcessed === null) {
        this.filter(record);
      } else {
        processed = await this.ctx.processor.processRecord(preProcessed);
        if (processed === null) {
          this.filter(record);
        } else {
          batch.push(processed);
        }
      }

      await this.ctx.pipelineListener.afterRecordProcessing(record, processed);
    } catch (error) {
      await this.handleProcessingError(record, error);
    }

    this.ctx.notifyJobUpdate('record-processed');
  }

  private filter(record: JobRecord<I>): void {
    this.ctx.logger.debug({ event: 'record_filtered', number: record.header.number }, `${describeRecord(record)} has been filtered`);
    this.ctx.metrics.incrementFilterCount();
  }

  /** Count the failure and end the run once the error count goes past the threshold. */
  private async handleProcessingError(record: JobRecord<I>, error: unknown): Promise<void> {
    const failure = new RecordProcessingError(record, error);
    this.ctx.logger.error({ event: 'record_processing_failed', number: record.header.number, err: error }, failure.message);

    await this.ctx.pipelineListener.onRecordProcessingException(record, error);
    this.ctx.metrics.incrementErrorCount();
    this.ctx.report.setLastError(failure);

    const { errorCount } = this.ctx.metrics;
    const { errorThreshold } = this.ctx.parameters;
    if (errorCount > errorThreshold) {
      throw new ErrorThresholdExceededError(errorCount, errorThreshold, failure);
    }
  }
}
