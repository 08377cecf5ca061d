import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { Batch } from '../../domain/model/Batch.js';
import type { RecordWriter } from '../../domain/ports/RecordWriter.js';

export interface FileRecordWriterOptions<P> {
  /** Append to an existing file instead of truncating it. Default: `false`. */
  readonly append?: boolean;
  /** Encoding of the written text. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Line terminator. Default: `'\n'`. */
  readonly lineSeparator?: string;
  /** Turns a payload into one line. Default: `String(payload)`. */
  readonly format?: (payload: P) => string;
}

/** Writes one line per record to a local file. Node.js only. */
export class FileRecordWriter<P = string> implements RecordWriter<P> {
  private readonly filePath: string;
  private readonly append: boolean;
  private readonly encoding: BufferEncoding;
  private readonly lineSeparator: string;
  private readonly format: (payload: P) => string;
  private handle: FileHandle | null = null;

  constructor(filePath: string, options?: FileRecordWriterOptions<P>) {
    this.filePath = filePath;
    this.append = options?.append ?? false;
    this.encoding = options?.encoding ?? 'utf-8';
    this.lineSeparator = options?.lineSeparator ?? '\n';
    this.format = options?.format ?? ((payload: P) => String(payload));
  }

  async open(): Promise<void> {
    this.handle = await open(this.filePath, this.append ? 'a' : 'w');
  }

  async writeRecords(batch: Batch<P>): Promise<void> {
    if (!this.handle) {
      throw new Error('FileRecordWriter: writer is not open. Call open() first.');
    }

    const content = batch.records.map((record) => this.format(record.payload) + this.lineSeparator).join('');
    await this.handle.write(content, null, this.encoding);
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }
}
