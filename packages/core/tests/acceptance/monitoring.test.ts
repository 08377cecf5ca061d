import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import { BatchJob } from '../../src/BatchJob.js';
import { IterableRecordReader } from '../../src/infrastructure/readers/IterableRecordReader.js';
import { InMemoryRecordWriter } from '../../src/infrastructure/writers/InMemoryRecordWriter.js';
import { passThrough } from '../../src/application/RecordProcessors.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';
import type { JobReportUpdate } from '../../src/domain/ports/JobMonitor.js';

function captureLogger() {
  const lines: unknown[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write: (line: string) => {
        lines.push(JSON.parse(line));
      },
    },
  );
  return { logger, lines };
}

function createJob(monitoring: boolean, monitor?: { notify: (update: JobReportUpdate) => void }) {
  return new BatchJob<string>({
    parameters: { name: 'monitored', monitoring },
    reader: new IterableRecordReader(['r1', 'r2', 'r3']),
    processor: passThrough(),
    writer: new InMemoryRecordWriter<string>(),
    monitor,
    logger: pino({ level: 'silent' }),
  });
}

describe('BatchJob: monitoring', () => {
  it('should publish status changes and processed records', async () => {
    const job = createJob(true);
    const events: DomainEvent[] = [];
    job.onAny((event) => events.push(event));

    await job.call();

    expect(events.map((event) => event.type)).toEqual([
      'job:status-changed',
      'job:status-changed',
      'job:record-processed',
      'job:record-processed',
      'job:record-processed',
      'job:status-changed',
      'job:status-changed',
    ]);
    expect(events.map((event) => event.report.status)).toEqual([
      'STARTING',
      'STARTED',
      'STARTED',
      'STARTED',
      'STARTED',
      'STOPPING',
      'COMPLETED',
    ]);
    expect(events.every((event) => event.jobName === 'monitored')).toBe(true);
  });

  it('should push snapshots that reflect the counters at that time', async () => {
    const job = createJob(true);
    const readCounts: number[] = [];
    job.on('job:record-processed', (event) => readCounts.push(event.report.metrics.readCount));

    await job.call();

    expect(readCounts).toEqual([1, 2, 3]);
  });

  it('should publish nothing when monitoring is off', async () => {
    const notify = vi.fn();
    const job = createJob(false, { notify });
    const handler = vi.fn();
    job.onAny(handler);

    await job.call();

    expect(handler).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
  });

  it('should push every update to a custom monitor', async () => {
    const notify = vi.fn<(update: JobReportUpdate) => void>();
    const job = createJob(true, { notify });

    await job.call();

    expect(notify.mock.calls.map(([update]) => update.reason)).toEqual([
      'status-changed',
      'status-changed',
      'record-processed',
      'record-processed',
      'record-processed',
      'status-changed',
      'status-changed',
    ]);
  });

  it('should stop publishing to handlers removed with offAny()', async () => {
    const job = createJob(true);
    const handler = vi.fn();
    job.onAny(handler).offAny(handler);

    await job.call();

    expect(handler).not.toHaveBeenCalled();
  });

  it('should log and ignore a failing monitor', async () => {
    const { logger, lines } = captureLogger();
    const job = new BatchJob<string>({
      parameters: { monitoring: true },
      reader: new IterableRecordReader(['r1']),
      processor: passThrough(),
      writer: new InMemoryRecordWriter<string>(),
      monitor: {
        notify() {
          throw new Error('dashboard offline');
        },
      },
      logger,
    });

    const report = await job.call();

    expect(report.status).toBe('COMPLETED');
    expect(lines).toContainEqual(
      expect.objectContaining({ level: 40, event: 'monitor_notify_failed', msg: 'Unable to push job report update' }),
    );
  });

  it('should log a rejected async monitor without failing the job', async () => {
    const { logger, lines } = captureLogger();
    const failure = new Error('dashboard timed out');
    const job = new BatchJob<string>({
      parameters: { monitoring: true },
      reader: new IterableRecordReader(['r1']),
      processor: passThrough(),
      writer: new InMemoryRecordWriter<string>(),
      monitor: {
        async notify() {
          throw failure;
        },
      },
      logger,
    });

    const report = await job.call();

    expect(report.status).toBe('COMPLETED');
    await vi.waitFor(() =>
      expect(lines).toContainEqual(
        expect.objectContaining({
          level: 40,
          event: 'monitor_notify_failed',
          reason: 'status-changed',
          msg: 'Unable to push job report update',
        }),
      ),
    );
  });

  it('should log a rejected async event subscriber', async () => {
    const { logger, lines } = captureLogger();
    const job = new BatchJob<string>({
      parameters: { monitoring: true },
      reader: new IterableRecordReader(['r1']),
      processor: passThrough(),
      writer: new InMemoryRecordWriter<string>(),
      logger,
    });
    job.on('job:record-processed', async () => {
      throw new Error('subscriber rejected');
    });

    const report = await job.call();

    expect(report.status).toBe('COMPLETED');
    await vi.waitFor(() =>
      expect(lines).toContainEqual(
        expect.objectContaining({ level: 40, event: 'monitor_handler_error', type: 'job:record-processed' }),
      ),
    );
  });
});

describe('BatchJob: logging', () => {
  it('should log the outcome with the job name', async () => {
    const { logger, lines } = captureLogger();
    const job = new BatchJob<string>({
      parameters: { name: 'import-users' },
      reader: new IterableRecordReader(['r1']),
      processor: passThrough(),
      writer: new InMemoryRecordWriter<string>(),
      logger,
    });

    await job.call();

    expect(lines).toContainEqual(
      expect.objectContaining({
        level: 30,
        job: 'import-users',
        event: 'job_finished',
        status: 'COMPLETED',
        msg: "Job 'import-users' finished with status: COMPLETED",
      }),
    );
  });

  it('should log processing failures at error level', async () => {
    const { logger, lines } = captureLogger();
    const job = new BatchJob<string>({
      reader: new IterableRecordReader(['r1', 'r2']),
      processor: {
        processRecord(record) {
          if (record.payload === 'r2') throw new Error('bad row');
          return record;
        },
      },
      writer: new InMemoryRecordWriter<string>(),
      logger,
    });

    await job.call();

    expect(lines).toContainEqual(
      expect.objectContaining({
        level: 50,
        event: 'record_processing_failed',
        number: 2,
        msg: 'Unable to process Record: {source=in-memory, number=2}',
      }),
    );
  });

  it('should log the parameters when the job starts', async () => {
    const { logger, lines } = captureLogger();
    const job = new BatchJob<string>({
      parameters: { batchSize: 10, errorThreshold: 3 },
      reader: new IterableRecordReader<string>([]),
      processor: passThrough(),
      writer: new InMemoryRecordWriter<string>(),
      logger,
    });

    await job.call();

    expect(lines).toContainEqual(
      expect.objectContaining({
        event: 'job_parameters',
        msg: 'Batch size: 10, error threshold: 3, monitoring: false',
      }),
    );
  });
});
