import type { Logger } from 'pino';
import type { JobParameters } from '../domain/model/JobParameters.js';
import type { JobStatus } from '../domain/model/JobStatus.js';
import type { SystemProperties } from '../domain/model/JobReport.js';
import type { RecordReader } from '../domain/ports/RecordReader.js';
import type { RecordWriter } from '../domain/ports/RecordWriter.js';
import type { RecordProcessor } from '../domain/ports/RecordProcessor.js';
import type { JobMonitor, JobReportUpdateReason } from '../domain/ports/JobMonitor.js';
import type {
  JobListener,
  BatchListener,
  RecordReaderListener,
  RecordWriterListener,
  PipelineListener,
} from '../domain/ports/JobListeners.js';
import { JobMetrics } from '../domain/model/JobMetrics.js';
import { JobReport } from '../domain/model/JobReport.js';
import { RecordTracker } from '../domain/model/RecordTracker.js';
import {
  CompositeJobListener,
  CompositeBatchListener,
  CompositeRecordReaderListener,
  CompositeRecordWriterListener,
  CompositePipelineListener,
} from './CompositeListeners.js';

export interface JobContextOptions<I, O> {
  readonly parameters: JobParameters;
  readonly reader: RecordReader<I>;
  readonly processor: RecordProcessor<I, O>;
  readonly writer: RecordWriter<O>;
  readonly jobListeners: readonly JobListener[];
  readonly batchListeners: readonly BatchListener<O>[];
  readonly readerListeners: readonly RecordReaderListener<I>[];
  readonly writerListeners: readonly RecordWriterListener<O>[];
  readonly pipelineListeners: readonly PipelineListener<I, O>[];
  readonly monitors: readonly JobMonitor[];
  readonly signal: AbortSignal | null;
  readonly logger: Logger;
  readonly systemProperties: SystemProperties;
}

/**
 * State of a single job run, shared by the use cases that drive it.
 *
 * This is an internal class. A fresh context (metrics, report, tracker) is
 * built for every `BatchJob`, and only the use cases mutate it.
 */
export class JobContext<I, O> {
  readonly parameters: JobParameters;
  readonly metrics = new JobMetrics();
  readonly report: JobReport;
  readonly tracker = new RecordTracker();

  readonly reader: RecordReader<I>;
  readonly processor: RecordProcessor<I, O>;
  readonly writer: RecordWriter<O>;

  readonly jobListener: CompositeJobListener;
  readonly batchListener: CompositeBatchListener<O>;
  readonly readerListener: CompositeRecordReaderListener<I>;
  readonly writerListener: CompositeRecordWriterListener<O>;
  readonly pipelineListener: CompositePipelineListener<I, O>;

  readonly logger: Logger;
  private readonly monitors: readonly JobMonitor[];
  private readonly signal: AbortSignal | null;
  private batchCount = 0;

  constructor(options: JobContextOptions<I, O>) {
    this.parameters = options.parameters;
    this.reader = options.reader;
    this.processor = options.processor;
    this.writer = options.writer;
    this.jobListener = new CompositeJobListener(options.jobListeners);
    this.batchListener = new CompositeBatchListener(options.batchListeners);
    this.readerListener = new CompositeRecordReaderListener(options.readerListeners);
    this.writerListener = new CompositeRecordWriterListener(options.writerListeners);
    this.pipelineListener = new CompositePipelineListener(options.pipelineListeners);
    this.monitors = options.monitors;
    this.signal = options.signal;
    this.logger = options.logger;
    this.report = new JobReport(options.parameters.name, options.parameters, this.metrics, options.systemProperties);
  }

  /** Move the report to `status` (announce it again if already there), log it and push it to the monitors. */
  setStatus(status: JobStatus): void {
    if (this.report.status !== status) {
      this.report.transitionTo(status);
    }
    this.logger.info({ event: 'job_status', status }, `Job '${this.parameters.name}' ${status.toLowerCase()}`);
    this.notifyJobUpdate('status-changed');
  }

  /** Push a report snapshot to every monitor when monitoring is enabled. */
  notifyJobUpdate(reason: JobReportUpdateReason): void {
    if (!this.parameters.monitoring) return;

    const update = { reason, report: this.report.snapshot(), timestamp: Date.now() };
    const reportFailure = (error: unknown): void => {
      this.logger.warn({ event: 'monitor_notify_failed', reason, err: error }, 'Unable to push job report update');
    };
    for (const monitor of this.monitors) {
      try {
        const pending = monitor.notify(update);
        if (pending instanceof Promise) {
          pending.catch(reportFailure);
        }
      } catch (error) {
        reportFailure(error);
      }
    }
  }

  /** Checked once per batch cycle. */
  isInterrupted(): boolean {
    return this.signal?.aborted ?? false;
  }

  nextBatchIndex(): number {
    return this.batchCount++;
  }
}
