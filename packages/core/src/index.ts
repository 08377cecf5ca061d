// Main entry point
export { BatchJob } from './BatchJob.js';
export type { BatchJobConfig } from './BatchJob.js';

// Domain model
export type { JobRecord, RecordHeader } from './domain/model/Record.js';
export { createRecord, createHeader, withPayload, describeRecord } from './domain/model/Record.js';
export type { Batch } from './domain/model/Batch.js';
export { createBatch, batchSize, isEmptyBatch } from './domain/model/Batch.js';
export { JobStatus, canTransition, isTerminalStatus } from './domain/model/JobStatus.js';
export type { JobParameters, JobParametersInput } from './domain/model/JobParameters.js';
export {
  createJobParameters,
  formatErrorThreshold,
  JobParametersSchema,
  InvalidJobParametersError,
  DEFAULT_JOB_NAME,
  DEFAULT_BATCH_SIZE,
  UNLIMITED_ERROR_THRESHOLD,
} from './domain/model/JobParameters.js';
export { JobMetrics } from './domain/model/JobMetrics.js';
export type { JobMetricsSnapshot } from './domain/model/JobMetrics.js';
export { JobReport } from './domain/model/JobReport.js';
export type { JobReportSnapshot, SystemProperties } from './domain/model/JobReport.js';
export { RecordTracker } from './domain/model/RecordTracker.js';

// Errors
export {
  JobError,
  ResourceOpeningError,
  ResourceClosingError,
  RecordReadingError,
  RecordProcessingError,
  ErrorThresholdExceededError,
  BatchWritingError,
  IllegalStateError,
  toJobError,
} from './domain/errors/JobError.js';
export type { JobErrorKind, JobResource, SerializedJobError } from './domain/errors/JobError.js';

// Domain services
export { formatJobReport, formatDuration } from './domain/services/JobReportFormatter.js';

// Ports (for custom implementations)
export type { MaybePromise } from './domain/ports/MaybePromise.js';
export type { RecordReader } from './domain/ports/RecordReader.js';
export type { RecordWriter } from './domain/ports/RecordWriter.js';
export type { RecordProcessor } from './domain/ports/RecordProcessor.js';
export type {
  JobListener,
  BatchListener,
  RecordReaderListener,
  RecordWriterListener,
  PipelineListener,
} from './domain/ports/JobListeners.js';
export type { JobMonitor, JobReportUpdate, JobReportUpdateReason } from './domain/ports/JobMonitor.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  JobStatusChangedEvent,
  JobRecordProcessedEvent,
} from './domain/events/DomainEvents.js';

// Application building blocks
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorReporter, EventHandler, WildcardHandler } from './application/EventBus.js';
export {
  CompositeJobListener,
  CompositeBatchListener,
  CompositeRecordReaderListener,
  CompositeRecordWriterListener,
  CompositePipelineListener,
} from './application/CompositeListeners.js';
export { passThrough, chainProcessors } from './application/RecordProcessors.js';

// Infrastructure adapters (built-in readers, writers, monitor, logging, configuration)
export { IterableRecordReader } from './infrastructure/readers/IterableRecordReader.js';
export type { IterableRecordReaderOptions } from './infrastructure/readers/IterableRecordReader.js';
export { FileRecordReader } from './infrastructure/readers/FileRecordReader.js';
export type { FileRecordReaderOptions } from './infrastructure/readers/FileRecordReader.js';
export { InMemoryRecordWriter } from './infrastructure/writers/InMemoryRecordWriter.js';
export { FileRecordWriter } from './infrastructure/writers/FileRecordWriter.js';
export type { FileRecordWriterOptions } from './infrastructure/writers/FileRecordWriter.js';
export { EventJobMonitor } from './infrastructure/monitoring/EventJobMonitor.js';
export { createLogger } from './infrastructure/logging/logger.js';
export type { Logger, LoggerOptions } from './infrastructure/logging/logger.js';
export {
  loadEnvironment,
  loadLogLevel,
  jobParametersFromEnv,
  captureSystemProperties,
  InvalidEnvironmentError,
} from './infrastructure/config/environment.js';
export type { Environment, LogLevel } from './infrastructure/config/environment.js';
