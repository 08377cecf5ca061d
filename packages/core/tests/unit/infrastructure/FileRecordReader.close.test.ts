import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import type { ReadStream } from 'node:fs';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileRecordReader } from '../../../src/infrastructure/readers/FileRecordReader.js';

const opened = vi.hoisted((): ReadStream[] => []);

vi.mock('node:fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs')>();
  return {
    ...actual,
    createReadStream: (...args: Parameters<typeof actual.createReadStream>) => {
      const stream = actual.createReadStream(...args);
      opened.push(stream);
      return stream;
    },
  };
});

const TEST_DIR = join(tmpdir(), 'pipebatch-test-filerecordreader-close');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('FileRecordReader: close', () => {
  it('should destroy the underlying stream when closed before the end of the file', async () => {
    const filePath = join(TEST_DIR, 'long.txt');
    writeFileSync(filePath, Array.from({ length: 20000 }, (_, i) => `line-${String(i)}`).join('\n'), 'utf-8');
    const reader = new FileRecordReader(filePath, { highWaterMark: 1024 });
    await reader.open();

    const first = await reader.readRecord();
    reader.close();

    expect(first?.payload).toBe('line-0');
    expect(opened).toHaveLength(1);
    expect(opened[0]?.destroyed).toBe(true);
  });

  it('should refuse to read once closed', async () => {
    const filePath = join(TEST_DIR, 'short.txt');
    writeFileSync(filePath, 'alpha\nbeta\n', 'utf-8');
    const reader = new FileRecordReader(filePath);
    await reader.open();
    reader.close();

    await expect(reader.readRecord()).rejects.toThrow('FileRecordReader: reader is not open. Call open() first.');
  });
});
