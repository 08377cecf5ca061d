import { describe, it, expect } from 'vitest';
import { formatJobReport, formatDuration } from '../../../src/domain/services/JobReportFormatter.js';
import type { JobReportSnapshot } from '../../../src/domain/model/JobReport.js';

const baseSnapshot: JobReportSnapshot = {
  jobName: 'import-users',
  status: 'COMPLETED',
  parameters: { name: 'import-users', batchSize: 2, errorThreshold: Number.POSITIVE_INFINITY, monitoring: false },
  metrics: {
    readCount: 5,
    writeCount: 4,
    filterCount: 1,
    errorCount: 0,
    startTime: 0,
    endTime: 1_234,
    duration: 1_234,
  },
  systemProperties: {
    nodeVersion: 'v20.0.0',
    platform: 'linux',
    arch: 'x64',
    pid: 42,
    hostname: 'test-host',
    cwd: '/tmp',
  },
};

describe('formatJobReport', () => {
  it('should render every section', () => {
    expect(formatJobReport(baseSnapshot)).toBe(
      [
        'Job Report:',
        '===========',
        'Name: import-users',
        'Status: COMPLETED',
        'Parameters:',
        '\tBatch size = 2',
        '\tError threshold = N/A',
        '\tMonitoring = false',
        'Metrics:',
        '\tStart time = 1970-01-01T00:00:00.000Z',
        '\tEnd time = 1970-01-01T00:00:01.234Z',
        '\tDuration = 1s 234ms',
        '\tRead count = 5',
        '\tWrite count = 4',
        '\tFilter count = 1',
        '\tError count = 0',
        'Last error:',
        '\tN/A',
      ].join('\n'),
    );
  });

  it('should print N/A for missing timestamps', () => {
    const text = formatJobReport({
      ...baseSnapshot,
      status: 'STARTING',
      metrics: { readCount: 0, writeCount: 0, filterCount: 0, errorCount: 0, duration: 0 },
    });

    expect(text).toContain('\tStart time = N/A\n\tEnd time = N/A\n\tDuration = 0ms');
  });

  it('should print the last error and its cause', () => {
    const text = formatJobReport({
      ...baseSnapshot,
      status: 'FAILED',
      parameters: { ...baseSnapshot.parameters, errorThreshold: 1 },
      lastError: {
        name: 'BatchWritingError',
        kind: 'write-failure',
        message: 'Unable to write batch #1 of 2 records',
        cause: 'connection reset',
      },
    });

    const lines = text.split('\n');
    expect(lines).toContain('\tError threshold = 1');
    expect(lines.slice(-3)).toEqual([
      'Last error:',
      '\tBatchWritingError: Unable to write batch #1 of 2 records',
      '\tCaused by: connection reset',
    ]);
  });
});

describe('formatDuration', () => {
  it('should print milliseconds only for short durations', () => {
    expect(formatDuration(0)).toBe('0ms');
    expect(formatDuration(12)).toBe('12ms');
  });

  it('should omit leading zero units', () => {
    expect(formatDuration(60_000)).toBe('1m 0s 0ms');
    expect(formatDuration(3_723_045)).toBe('1h 2m 3s 45ms');
  });
});
