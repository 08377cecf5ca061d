import type { JobParameters } from './JobParameters.js';
import type { JobMetrics, JobMetricsSnapshot } from './JobMetrics.js';
import type { JobError, SerializedJobError } from '../errors/JobError.js';
import { IllegalStateError } from '../errors/JobError.js';
import { JobStatus, canTransition, isTerminalStatus } from './JobStatus.js';
import { formatJobReport } from '../services/JobReportFormatter.js';

/** Snapshot of the process a job ran in. */
export interface SystemProperties {
  readonly nodeVersion: string;
  readonly platform: string;
  readonly arch: string;
  readonly pid: number;
  readonly hostname: string;
  readonly cwd: string;
}

/** Serialisable, frozen copy of a report, as pushed to job monitors. */
export interface JobReportSnapshot {
  readonly jobName: string;
  readonly status: JobStatus;
  readonly parameters: JobParameters;
  readonly metrics: JobMetricsSnapshot;
  readonly lastError?: SerializedJobError;
  readonly systemProperties: SystemProperties;
}

/**
 * Live summary of a job run, and its only result.
 *
 * The engine moves the status along the lifecycle FSM and records the last
 * error while the job runs. Once a terminal status is reached the report is
 * read-only.
 */
export class JobReport {
  private currentStatus: JobStatus = JobStatus.STARTING;
  private error: JobError | undefined;

  constructor(
    readonly jobName: string,
    readonly parameters: JobParameters,
    private readonly jobMetrics: JobMetrics,
    readonly systemProperties: SystemProperties,
  ) {}

  get status(): JobStatus {
    return this.currentStatus;
  }

  get lastError(): JobError | undefined {
    return this.error;
  }

  get metrics(): JobMetricsSnapshot {
    return this.jobMetrics.snapshot();
  }

  isTerminal(): boolean {
    return isTerminalStatus(this.currentStatus);
  }

  transitionTo(status: JobStatus): void {
    if (!canTransition(this.currentStatus, status)) {
      throw new IllegalStateError(`Invalid state transition: ${this.currentStatus} → ${status}`);
    }
    this.currentStatus = status;
  }

  setLastError(error: JobError): void {
    this.assertWritable();
    this.error = error;
  }

  snapshot(): JobReportSnapshot {
    return Object.freeze({
      jobName: this.jobName,
      status: this.currentStatus,
      parameters: this.parameters,
      metrics: this.metrics,
      ...(this.error ? { lastError: this.error.toJSON() } : {}),
      systemProperties: this.systemProperties,
    });
  }

  toString(): string {
    return formatJobReport(this.snapshot());
  }

  private assertWritable(): void {
    if (this.isTerminal()) {
      throw new IllegalStateError(`Report of job '${this.jobName}' is read-only once the job is ${this.currentStatus}`);
    }
  }
}
