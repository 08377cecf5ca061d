import type { JobReportSnapshot } from '../model/JobReport.js';
import type { JobStatus } from '../model/JobStatus.js';

/** Emitted on every status change of a monitored job. */
export interface JobStatusChangedEvent {
  readonly type: 'job:status-changed';
  readonly jobName: string;
  readonly status: JobStatus;
  readonly report: JobReportSnapshot;
  readonly timestamp: number;
}

/** Emitted after each record of a monitored job has gone through the pipeline. */
export interface JobRecordProcessedEvent {
  readonly type: 'job:record-processed';
  readonly jobName: string;
  readonly report: JobReportSnapshot;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent = JobStatusChangedEvent | JobRecordProcessedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
