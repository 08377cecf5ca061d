import type { JobReport } from '../../domain/model/JobReport.js';
import { JobStatus } from '../../domain/model/JobStatus.js';
import { formatErrorThreshold } from '../../domain/model/JobParameters.js';
import {
  ResourceOpeningError,
  ResourceClosingError,
  toJobError,
} from '../../domain/errors/JobError.js';
import type { JobResource } from '../../domain/errors/JobError.js';
import type { JobContext } from '../JobContext.js';
import { ReadAndProcessBatch } from './ReadAndProcessBatch.js';
import { WriteBatch } from './WriteBatch.js';

/**
 * Use case: drive one job run from `STARTING` to a terminal status.
 *
 * Never rejects. Fatal failures end the run as `FAILED` with the error stored
 * on the report; reader and writer are closed on every path.
 */
export class RunJob<I, O> {
  constructor(private readonly ctx: JobContext<I, O>) {}

  async execute(): Promise<JobReport> {
    let outcome: JobStatus;

    try {
      await this.start();
      await this.open('reader');
      await this.open('writer');
      this.ctx.setStatus(JobStatus.STARTED);
      await this.processRecords();
      this.ctx.setStatus(JobStatus.STOPPING);
      outcome = this.ctx.isInterrupted() ? JobStatus.ABORTED : JobStatus.COMPLETED;
    } catch (error) {
      this.fail(error);
      outcome = JobStatus.FAILED;
    }

    await this.close('reader');
    await this.close('writer');
    await this.teardown(outcome);

    return this.ctx.report;
  }

  private async start(): Promise<void> {
    const { parameters, logger } = this.ctx;
    this.ctx.setStatus(JobStatus.STARTING);
    await this.ctx.jobListener.beforeJobStart(parameters);
    this.ctx.metrics.setStartTime(Date.now());

    const errorThreshold = formatErrorThreshold(parameters.errorThreshold);
    logger.info(
      { event: 'job_parameters', batchSize: parameters.batchSize, errorThreshold, monitoring: parameters.monitoring },
      `Batch size: ${String(parameters.batchSize)}, error threshold: ${errorThreshold}, monitoring: ${String(parameters.monitoring)}`,
    );
  }

  private async open(resource: JobResource): Promise<void> {
    try {
      this.ctx.logger.debug({ event: 'resource_opening', resource }, `Opening record ${resource}`);
      if (resource === 'reader') {
        await this.ctx.reader.open?.();
      } else {
        await this.ctx.writer.open?.();
      }
    } catch (error) {
      throw new ResourceOpeningError(resource, error);
    }
  }

  /** Loops until the source is exhausted or the signal has fired, checked before each batch. */
  private async processRecords(): Promise<void> {
    const readAndProcess = new ReadAndProcessBatch(this.ctx);
    const write = new WriteBatch(this.ctx);

    while (this.ctx.tracker.moreRecords() && !this.ctx.isInterrupted()) {
      const batch = await readAndProcess.execute();
      await write.execute(batch);
    }

    if (this.ctx.isInterrupted()) {
      this.ctx.logger.info(
        { event: 'job_interrupted' },
        `Job '${this.ctx.parameters.name}' has been interrupted, aborting execution`,
      );
    }
  }

  private fail(error: unknown): void {
    const failure = toJobError(error);
    this.ctx.logger.error({ event: 'job_failed', kind: failure.kind, err: failure.cause ?? failure }, failure.message);
    this.ctx.report.setLastError(failure);
  }

  /** Close failures are recorded but never change the outcome of the run. */
  private async close(resource: JobResource): Promise<void> {
    try {
      this.ctx.logger.debug({ event: 'resource_closing', resource }, `Closing record ${resource}`);
      if (resource === 'reader') {
        await this.ctx.reader.close?.();
      } else {
        await this.ctx.writer.close?.();
      }
    } catch (error) {
      const failure = new ResourceClosingError(resource, error);
      this.ctx.logger.warn({ event: 'resource_close_failed', resource, err: error }, failure.message);
      this.ctx.report.setLastError(failure);
    }
  }

  private async teardown(status: JobStatus): Promise<void> {
    const { report, logger } = this.ctx;
    this.ctx.metrics.setEndTime(Date.now());
    this.ctx.setStatus(status);
    logger.info({ event: 'job_finished', status }, `Job '${report.jobName}' finished with status: ${status}`);
    logger.debug({ event: 'job_report' }, report.toString());

    try {
      await this.ctx.jobListener.afterJobEnd(report);
    } catch (error) {
      logger.error({ event: 'after_job_end_failed', err: error }, 'Job listener failed after the job ended');
    }
  }
}
