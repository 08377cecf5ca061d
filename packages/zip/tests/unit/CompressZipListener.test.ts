import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import AdmZip from 'adm-zip';
import { pino } from 'pino';
import { CompressZipListener } from '../../src/CompressZipListener.js';

let workDir: string;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), 'pipebatch-zip-compress-'));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

function captureLogger() {
  const lines: unknown[] = [];
  const logger = pino(
    { level: 'info' },
    {
      write: (line: string) => {
        lines.push(JSON.parse(line));
      },
    },
  );
  return { logger, lines };
}

function readEntries(archive: string): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const entry of new AdmZip(archive).getEntries()) {
    if (!entry.isDirectory) {
      entries[entry.entryName] = entry.getData().toString('utf-8');
    }
  }
  return entries;
}

describe('CompressZipListener', () => {
  it('should archive files at the root and directories under their name', async () => {
    const file = join(workDir, 'summary.txt');
    const directory = join(workDir, 'reports');
    writeFileSync(file, 'done');
    mkdirSync(directory);
    writeFileSync(join(directory, 'day1.txt'), 'alpha');
    const archive = join(workDir, 'out.zip');

    await new CompressZipListener(archive, [file, directory], { logger: pino({ level: 'silent' }) }).afterJobEnd();

    expect(readEntries(archive)).toEqual({ 'summary.txt': 'done', 'reports/day1.txt': 'alpha' });
  });

  it('should log and not throw when an input is missing', async () => {
    const { logger, lines } = captureLogger();
    const archive = join(workDir, 'out.zip');
    const listener = new CompressZipListener(archive, [join(workDir, 'missing.txt')], { logger });

    await expect(listener.afterJobEnd()).resolves.toBeUndefined();

    expect(existsSync(archive)).toBe(false);
    expect(lines).toContainEqual(
      expect.objectContaining({
        level: 50,
        listener: 'CompressZipListener',
        event: 'zip_write_failed',
        msg: `Unable to write '${archive}'`,
      }),
    );
  });

  it('should require at least one input', () => {
    expect(() => new CompressZipListener(join(workDir, 'out.zip'), [])).toThrow(
      'CompressZipListener: at least one input is required',
    );
  });
});
