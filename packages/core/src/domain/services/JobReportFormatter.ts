import type { JobReportSnapshot } from '../model/JobReport.js';
import { formatErrorThreshold } from '../model/JobParameters.js';

/**
 * Render a report snapshot as the human-readable block logged at the end of a job.
 *
 * ```
 * Job Report:
 * ===========
 * Name: import-users
 * Status: COMPLETED
 * Parameters:
 * 	Batch size = 100
 * 	...
 * ```
 */
export function formatJobReport(report: JobReportSnapshot): string {
  const { parameters, metrics } = report;
  const lines = [
    'Job Report:',
    '===========',
    `Name: ${report.jobName}`,
    `Status: ${report.status}`,
    'Parameters:',
    `\tBatch size = ${String(parameters.batchSize)}`,
    `\tError threshold = ${formatErrorThreshold(parameters.errorThreshold)}`,
    `\tMonitoring = ${String(parameters.monitoring)}`,
    'Metrics:',
    `\tStart time = ${formatTimestamp(metrics.startTime)}`,
    `\tEnd time = ${formatTimestamp(metrics.endTime)}`,
    `\tDuration = ${formatDuration(metrics.duration)}`,
    `\tRead count = ${String(metrics.readCount)}`,
    `\tWrite count = ${String(metrics.writeCount)}`,
    `\tFilter count = ${String(metrics.filterCount)}`,
    `\tError count = ${String(metrics.errorCount)}`,
    'Last error:',
    `\t${report.lastError ? `${report.lastError.name}: ${report.lastError.message}` : 'N/A'}`,
  ];

  if (report.lastError?.cause !== undefined) {
    lines.push(`\tCaused by: ${report.lastError.cause}`);
  }

  return lines.join('\n');
}

function formatTimestamp(timestamp: number | undefined): string {
  return timestamp === undefined ? 'N/A' : new Date(timestamp).toISOString();
}

/** `1h 2m 3s 45ms`, leading zero units omitted. */
export function formatDuration(ms: number): string {
  const hours = Math.floor(ms / 3_600_000);
  const minutes = Math.floor((ms % 3_600_000) / 60_000);
  const seconds = Math.floor((ms % 60_000) / 1000);
  const millis = ms % 1000;

  const parts: string[] = [];
  if (hours > 0) parts.push(`${String(hours)}h`);
  if (hours > 0 || minutes > 0) parts.push(`${String(minutes)}m`);
  if (hours > 0 || minutes > 0 || seconds > 0) parts.push(`${String(seconds)}s`);
  parts.push(`${String(millis)}ms`);
  return parts.join(' ');
}
