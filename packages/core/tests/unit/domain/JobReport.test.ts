import { describe, it, expect } from 'vitest';
import { JobReport } from '../../../src/domain/model/JobReport.js';
import type { SystemProperties } from '../../../src/domain/model/JobReport.js';
import { JobMetrics } from '../../../src/domain/model/JobMetrics.js';
import { JobStatus } from '../../../src/domain/model/JobStatus.js';
import { createJobParameters } from '../../../src/domain/model/JobParameters.js';
import { IllegalStateError, RecordReadingError } from '../../../src/domain/errors/JobError.js';

const systemProperties: SystemProperties = {
  nodeVersion: 'v20.0.0',
  platform: 'linux',
  arch: 'x64',
  pid: 42,
  hostname: 'test-host',
  cwd: '/tmp',
};

function createReport(metrics = new JobMetrics()): JobReport {
  return new JobReport('import-users', createJobParameters({ name: 'import-users' }), metrics, systemProperties);
}

describe('JobReport', () => {
  it('should start in STARTING without error', () => {
    const report = createReport();

    expect(report.status).toBe(JobStatus.STARTING);
    expect(report.lastError).toBeUndefined();
    expect(report.isTerminal()).toBe(false);
  });

  it('should move along valid transitions', () => {
    const report = createReport();

    report.transitionTo(JobStatus.STARTED);
    report.transitionTo(JobStatus.STOPPING);
    report.transitionTo(JobStatus.COMPLETED);

    expect(report.status).toBe(JobStatus.COMPLETED);
    expect(report.isTerminal()).toBe(true);
  });

  it('should reject an invalid transition', () => {
    const report = createReport();

    expect(() => report.transitionTo(JobStatus.COMPLETED)).toThrow(
      new IllegalStateError('Invalid state transition: STARTING → COMPLETED'),
    );
    expect(report.status).toBe(JobStatus.STARTING);
  });

  it('should keep only the last error', () => {
    const report = createReport();
    const first = new RecordReadingError(new Error('first'));
    const second = new RecordReadingError(new Error('second'));

    report.setLastError(first);
    report.setLastError(second);

    expect(report.lastError).toBe(second);
  });

  it('should be read-only once terminal', () => {
    const report = createReport();
    report.transitionTo(JobStatus.FAILED);

    expect(() => report.setLastError(new RecordReadingError(new Error('late')))).toThrow(IllegalStateError);
    expect(() => report.transitionTo(JobStatus.STARTED)).toThrow(IllegalStateError);
  });

  it('should expose live metrics', () => {
    const metrics = new JobMetrics();
    const report = createReport(metrics);

    metrics.incrementReadCount();
    metrics.incrementReadCount();

    expect(report.metrics.readCount).toBe(2);
  });

  it('should serialise the last error in snapshots', () => {
    const report = createReport();
    report.setLastError(new RecordReadingError(new Error('disk unplugged')));

    const snapshot = report.snapshot();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot.jobName).toBe('import-users');
    expect(snapshot.status).toBe(JobStatus.STARTING);
    expect(snapshot.systemProperties).toBe(systemProperties);
    expect(snapshot.lastError).toEqual({
      name: 'RecordReadingError',
      kind: 'read-failure',
      message: 'Unable to read next record',
      cause: 'disk unplugged',
    });
  });

  it('should omit lastError from snapshots when nothing failed', () => {
    expect('lastError' in createReport().snapshot()).toBe(false);
  });

  it('should render as the formatted report', () => {
    const text = createReport().toString();

    expect(text.split('\n').slice(0, 4)).toEqual(['Job Report:', '===========', 'Name: import-users', 'Status: STARTING']);
  });
});
