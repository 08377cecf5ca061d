import type { Batch } from '../../domain/model/Batch.js';
import { batchSize, isEmptyBatch } from '../../domain/model/Batch.js';
import { BatchWritingError } from '../../domain/errors/JobError.js';
import type { JobContext } from '../JobContext.js';

/** Use case: hand a non-empty batch to the writer. Empty batches are skipped silently. */
export class WriteBatch<I, O> {
  constructor(private readonly ctx: JobContext<I, O>) {}

  async execute(batch: Batch<O>): Promise<void> {
    if (isEmptyBatch(batch)) {
      this.ctx.logger.debug({ event: 'batch_skipped', batchIndex: batch.index }, 'Skipping empty batch');
      return;
    }

    this.ctx.logger.debug(
      { event: 'batch_writing', batchIndex: batch.index, size: batchSize(batch) },
      `Writing batch #${String(batch.index)}`,
    );

    try {
      await this.ctx.writerListener.beforeRecordWriting(batch);
      await this.ctx.writer.writeRecords(batch);
      await this.ctx.writerListener.afterRecordWriting(batch);
      await this.ctx.batchListener.afterBatchWriting(batch);
      this.ctx.metrics.incrementWriteCount(batchSize(batch));
    } catch (error) {
      await this.ctx.writerListener.onRecordWritingException(batch, error);
      await this.ctx.batchListener.onBatchWritingException(batch, error);
      throw new BatchWritingError(batch, error);
    }
  }
}
