import type { JobRecord } from '../../domain/model/Record.js';
import type { RecordReader } from '../../domain/ports/RecordReader.js';
import { createHeader, createRecord } from '../../domain/model/Record.js';

export interface IterableRecordReaderOptions {
  /** Source name stamped on record headers. Default: `'in-memory'`. */
  readonly source?: string;
}

/** Reads payloads from an array, generator or async iterable. Records are numbered from 1. */
export class IterableRecordReader<P> implements RecordReader<P> {
  private readonly iterable: Iterable<P> | AsyncIterable<P>;
  private readonly source: string;
  private iterator: Iterator<P> | AsyncIterator<P> | null = null;
  private count = 0;

  constructor(iterable: Iterable<P> | AsyncIterable<P>, options?: IterableRecordReaderOptions) {
    this.iterable = iterable;
    this.source = options?.source ?? 'in-memory';
  }

  open(): void {
    this.iterator = this.isAsyncIterable(this.iterable)
      ? this.iterable[Symbol.asyncIterator]()
      : this.iterable[Symbol.iterator]();
  }

  async readRecord(): Promise<JobRecord<P> | null> {
    if (!this.iterator) {
      throw new Error('IterableRecordReader: reader is not open. Call open() first.');
    }

    const next = await this.iterator.next();
    if (next.done) return null;

    this.count++;
    return createRecord(createHeader(this.count, this.source), next.value);
  }

  async close(): Promise<void> {
    const iterator = this.iterator;
    this.iterator = null;
    await iterator?.return?.();
  }

  private isAsyncIterable(iterable: Iterable<P> | AsyncIterable<P>): iterable is AsyncIterable<P> {
    return Symbol.asyncIterator in iterable;
  }
}
