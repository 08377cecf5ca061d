import type { Logger } from 'pino';
import type { JobParameters, JobParametersInput } from './domain/model/JobParameters.js';
import type { JobReport } from './domain/model/JobReport.js';
import type { RecordReader } from './domain/ports/RecordReader.js';
import type { RecordWriter } from './domain/ports/RecordWriter.js';
import type { RecordProcessor } from './domain/ports/RecordProcessor.js';
import type { JobMonitor } from './domain/ports/JobMonitor.js';
import type { EventType } from './domain/events/DomainEvents.js';
import type {
  JobListener,
  BatchListener,
  RecordReaderListener,
  RecordWriterListener,
  PipelineListener,
} from './domain/ports/JobListeners.js';
import { createJobParameters } from './domain/model/JobParameters.js';
import { IllegalStateError } from './domain/errors/JobError.js';
import { JobContext } from './application/JobContext.js';
import { RunJob } from './application/usecases/RunJob.js';
import type { EventHandler, WildcardHandler } from './application/EventBus.js';
import { EventJobMonitor } from './infrastructure/monitoring/EventJobMonitor.js';
import { captureSystemProperties } from './infrastructure/config/environment.js';
import { createLogger } from './infrastructure/logging/logger.js';

/** Configuration for a read-process-write job. */
export interface BatchJobConfig<I, O> {
  /** Name, batch size, error threshold and monitoring flag. Validated on construction. */
  readonly parameters?: JobParametersInput;
  readonly reader: RecordReader<I>;
  /** Transforms or filters each record. Use `passThrough()` to keep records as read. */
  readonly processor: RecordProcessor<I, O>;
  readonly writer: RecordWriter<O>;
  readonly jobListeners?: readonly JobListener[];
  readonly batchListeners?: readonly BatchListener<O>[];
  readonly readerListeners?: readonly RecordReaderListener<I>[];
  readonly writerListeners?: readonly RecordWriterListener<O>[];
  readonly pipelineListeners?: readonly PipelineListener<I, O>[];
  /**
   * Extra sink for report snapshots, called next to the built-in event monitor.
   * Only used when `parameters.monitoring` is `true`.
   */
  readonly monitor?: JobMonitor;
  /** Interrupts the run between two batches. The job then ends `ABORTED`. */
  readonly signal?: AbortSignal;
  /** Default: `createLogger()`. Every log line carries the job name. */
  readonly logger?: Logger;
}

/**
 * A read-process-write job: reads records one by one, runs each through the
 * processor, groups survivors into batches of `batchSize` and writes each
 * batch, until the reader is exhausted or the run is interrupted.
 *
 * A `BatchJob` runs once. Build a new instance for every run.
 *
 * @example
 * ```typescript
 * const job = new BatchJob({
 *   parameters: { name: 'import-users', batchSize: 500, errorThreshold: 10 },
 *   reader: new FileRecordReader('users.csv'),
 *   processor: new CsvRecordMapper({ fields: ['email', 'name'], skipHeader: true }),
 *   writer: usersWriter,
 * });
 * const report = await job.call();
 * ```
 */
export class BatchJob<I = unknown, O = I> {
  private readonly ctx: JobContext<I, O>;
  private readonly events: EventJobMonitor;
  private started = false;

  constructor(config: BatchJobConfig<I, O>) {
    const parameters: JobParameters = createJobParameters(config.parameters);
    const logger = (config.logger ?? createLogger()).child({ job: parameters.name });
    this.events = new EventJobMonitor(logger);

    this.ctx = new JobContext({
      parameters,
      reader: config.reader,
      processor: config.processor,
      writer: config.writer,
      jobListeners: config.jobListeners ?? [],
      batchListeners: config.batchListeners ?? [],
      readerListeners: config.readerListeners ?? [],
      writerListeners: config.writerListeners ?? [],
      pipelineListeners: config.pipelineListeners ?? [],
      monitors: config.monitor ? [this.events, config.monitor] : [this.events],
      signal: config.signal ?? null,
      logger,
      systemProperties: captureSystemProperties(),
    });
  }

  getName(): string {
    return this.ctx.parameters.name;
  }

  getParameters(): JobParameters {
    return this.ctx.parameters;
  }

  /** The live report. Read-only once the job has reached a terminal status. */
  getReport(): JobReport {
    return this.ctx.report;
  }

  /** Subscribe to monitoring events (requires `parameters.monitoring`). Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): this {
    this.events.on(type, handler);
    return this;
  }

  /** Subscribe to all monitoring events regardless of type. Returns `this` for chaining. */
  onAny(handler: WildcardHandler): this {
    this.events.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: WildcardHandler): this {
    this.events.offAny(handler);
    return this;
  }

  /**
   * Run the job and resolve with its report.
   *
   * Failures of the reader, processor, writer or listeners never reject: they
   * are encoded in `report.status` and `report.lastError`.
   *
   * @throws IllegalStateError if the job has already been run.
   */
  async call(): Promise<JobReport> {
    if (this.started) {
      throw new IllegalStateError(`Job '${this.getName()}' has already been run. Create a new job for each run.`);
    }
    this.started = true;
    return new RunJob(this.ctx).execute();
  }
}
