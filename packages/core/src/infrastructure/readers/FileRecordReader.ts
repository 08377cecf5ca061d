import { createReadStream } from 'node:fs';
import type { ReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';
import type { JobRecord } from '../../domain/model/Record.js';
import type { RecordReader } from '../../domain/ports/RecordReader.js';
import { createHeader, createRecord } from '../../domain/model/Record.js';

export interface FileRecordReaderOptions {
  /** Encoding for reading the file. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/**
 * Reads a text file line by line, one record per line, using `createReadStream`.
 * Node.js only. The header `source` is the file path.
 */
export class FileRecordReader implements RecordReader<string> {
  private readonly filePath: string;
  private readonly encoding: BufferEncoding;
  private readonly highWaterMark: number;
  private stream: ReadStream | null = null;
  private lines: Interface | null = null;
  private iterator: AsyncIterator<string> | null = null;
  private count = 0;

  constructor(filePath: string, options?: FileRecordReaderOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding ?? 'utf-8';
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  /** Fails when the path does not exist or is not a regular file. */
  async open(): Promise<void> {
    const stats = await stat(this.filePath);
    if (!stats.isFile()) {
      throw new Error(`FileRecordReader: '${this.filePath}' is not a file`);
    }

    this.stream = createReadStream(this.filePath, {
      encoding: this.encoding,
      highWaterMark: this.highWaterMark,
    });
    this.lines = createInterface({ input: this.stream, crlfDelay: Infinity });
    this.iterator = this.lines[Symbol.asyncIterator]();
  }

  async readRecord(): Promise<JobRecord<string> | null> {
    if (!this.iterator) {
      throw new Error('FileRecordReader: reader is not open. Call open() first.');
    }

    const next = await this.iterator.next();
    if (next.done) return null;

    this.count++;
    return createRecord(createHeader(this.count, this.filePath), next.value);
  }

  /** Releases the file descriptor, also when the file was not read to the end. */
  close(): void {
    this.lines?.close();
    this.stream?.destroy();
    this.stream = null;
    this.lines = null;
    this.iterator = null;
  }
}
