/** Diagnostic metadata attached to every record by the reader that produced it. */
export interface RecordHeader {
  /** One-based ordinal of the record in its source. */
  readonly number: number;
  /** Name of the source the record was read from (file path, `in-memory`, ...). */
  readonly source: string;
  /** Epoch timestamp at which the record was read. */
  readonly creationDate: number;
}

/**
 * A unit of data flowing through the read-process-write pipeline.
 *
 * The payload is opaque to the engine: only readers, processors and writers
 * know what it contains.
 */
export interface JobRecord<P = unknown> {
  readonly header: RecordHeader;
  readonly payload: P;
}

/** Create a record header stamped with the current time. */
export function createHeader(number: number, source: string, creationDate: number = Date.now()): RecordHeader {
  return { number, source, creationDate };
}

export function createRecord<P>(header: RecordHeader, payload: P): JobRecord<P> {
  return { header, payload };
}

/** Keep the header of `record` and replace its payload. Used by processors that transform records. */
export function withPayload<I, O>(record: JobRecord<I>, payload: O): JobRecord<O> {
  return { header: record.header, payload };
}

/** Short description for log lines, e.g. `Record: {source=users.csv, number=3}`. */
export function describeRecord(record: JobRecord): string {
  return `Record: {source=${record.header.source}, number=${String(record.header.number)}}`;
}
