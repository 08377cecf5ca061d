import Papa from 'papaparse';
import type { JobRecord, RecordProcessor } from '@pipebatch/core';
import { describeRecord, withPayload } from '@pipebatch/core';
import { DEFAULT_DELIMITER, DEFAULT_QUALIFIER } from './CsvRecordMarshaller.js';

/** One CSV line mapped to its column names. */
export type CsvRow = Readonly<Record<string, string>>;

export interface CsvRecordMapperOptions {
  /** Column names, in file order. */
  readonly fields: readonly string[];
  /** Column delimiter. Default: `,`. */
  readonly delimiter?: string;
  /** Field qualifier. Default: `"`. */
  readonly qualifier?: string;
  /** Filter out record number 1 (the header line). Default: `false`. */
  readonly skipHeader?: boolean;
  /** Trim whitespace around each value. Default: `false`. */
  readonly trimWhitespace?: boolean;
}

/**
 * Processor that maps one CSV line (as read by `FileRecordReader`) to an
 * object keyed by column name, using `papaparse`.
 *
 * A line whose column count differs from `fields`, or that cannot be parsed,
 * throws: the job counts it against its error threshold.
 */
export class CsvRecordMapper implements RecordProcessor<string, CsvRow> {
  private readonly fields: readonly string[];
  private readonly delimiter: string;
  private readonly qualifier: string;
  private readonly skipHeader: boolean;
  private readonly trimWhitespace: boolean;

  constructor(options: CsvRecordMapperOptions) {
    if (options.fields.length === 0) {
      throw new Error('CsvRecordMapper: at least one field is required');
    }
    this.fields = options.fields;
    this.delimiter = options.delimiter ?? DEFAULT_DELIMITER;
    this.qualifier = options.qualifier ?? DEFAULT_QUALIFIER;
    this.skipHeader = options.skipHeader ?? false;
    this.trimWhitespace = options.trimWhitespace ?? false;
  }

  processRecord(record: JobRecord<string>): JobRecord<CsvRow> | null {
    if (this.skipHeader && record.header.number === 1) return null;

    const result = Papa.parse<string[]>(record.payload, {
      delimiter: this.delimiter,
      quoteChar: this.qualifier,
      header: false,
      dynamicTyping: false,
    });

    const firstError = result.errors[0];
    if (firstError) {
      throw new Error(`Unable to parse ${describeRecord(record)}: ${firstError.message}`);
    }

    const values = result.data[0] ?? [];
    if (values.length !== this.fields.length) {
      throw new Error(
        `Expected ${String(this.fields.length)} fields but found ${String(values.length)} in ${describeRecord(record)}`,
      );
    }

    const row: Record<string, string> = {};
    this.fields.forEach((field, i) => {
      const value = values[i] ?? '';
      row[field] = this.trimWhitespace ? value.trim() : value;
    });

    return withPayload(record, Object.freeze(row));
  }
}
