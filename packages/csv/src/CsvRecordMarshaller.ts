import Papa from 'papaparse';
import type { JobRecord, RecordProcessor } from '@pipebatch/core';
import { withPayload } from '@pipebatch/core';

export const DEFAULT_DELIMITER = ',';
export const DEFAULT_QUALIFIER = '"';

/** Returns the values to write, in column order, for one payload. */
export type FieldExtractor<P> = (payload: P) => Iterable<unknown>;

export interface CsvRecordMarshallerOptions {
  /** Column delimiter. Default: `,`. */
  readonly delimiter?: string;
  /** Character wrapped around every field. Qualifiers inside a field are doubled. Default: `"`. */
  readonly qualifier?: string;
}

/**
 * Processor that marshals a payload to one CSV line with `papaparse`.
 *
 * Every field is qualified; `null` and `undefined` become empty fields. The
 * line has no terminator: the writer decides how lines are separated.
 * Nested objects are written with `String(value)`, not marshalled recursively.
 *
 * @example
 * ```typescript
 * const marshaller = new CsvRecordMarshaller<User>(['id', 'email']);
 * // { id: 1, email: 'a@test.com' } → "1","a@test.com"
 * ```
 */
export class CsvRecordMarshaller<P> implements RecordProcessor<P, string> {
  private readonly extractFields: FieldExtractor<P>;
  private readonly delimiter: string;
  private readonly qualifier: string;

  /**
   * @param fields - Property names to write, in order, or a custom extractor.
   */
  constructor(fields: readonly (keyof P & string)[] | FieldExtractor<P>, options?: CsvRecordMarshallerOptions) {
    if (typeof fields !== 'function' && fields.length === 0) {
      throw new Error('CsvRecordMarshaller: at least one field is required');
    }
    this.extractFields = typeof fields === 'function' ? fields : (payload: P) => fields.map((field) => payload[field]);
    this.delimiter = options?.delimiter ?? DEFAULT_DELIMITER;
    this.qualifier = options?.qualifier ?? DEFAULT_QUALIFIER;
  }

  processRecord(record: JobRecord<P>): JobRecord<string> {
    const values = Array.from(this.extractFields(record.payload), toField);

    const line = Papa.unparse([values], {
      delimiter: this.delimiter,
      quoteChar: this.qualifier,
      escapeChar: this.qualifier,
      quotes: true,
      newline: '',
    });

    return withPayload(record, line);
  }
}

function toField(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}
