import type { JobReportSnapshot } from '../model/JobReport.js';
import type { MaybePromise } from './MaybePromise.js';

/** Why a snapshot was pushed. */
export type JobReportUpdateReason = 'status-changed' | 'record-processed';

export interface JobReportUpdate {
  readonly reason: JobReportUpdateReason;
  readonly report: JobReportSnapshot;
  readonly timestamp: number;
}

/**
 * Push-only sink for report snapshots.
 *
 * When `parameters.monitoring` is `true` the job calls `notify()` on every
 * status change and after every processed record. The job does not wait for
 * a returned promise; a rejection is logged at warn level like a throw.
 */
export interface JobMonitor {
  notify(update: JobReportUpdate): MaybePromise<void>;
}
