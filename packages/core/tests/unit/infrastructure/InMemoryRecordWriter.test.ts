import { describe, it, expect } from 'vitest';
import { InMemoryRecordWriter } from '../../../src/infrastructure/writers/InMemoryRecordWriter.js';
import { createBatch } from '../../../src/domain/model/Batch.js';
import { createHeader, createRecord } from '../../../src/domain/model/Record.js';

describe('InMemoryRecordWriter', () => {
  it('should keep batches, records and payloads in write order', () => {
    const writer = new InMemoryRecordWriter<string>();
    const r1 = createRecord(createHeader(1, 'test', 0), 'a');
    const r2 = createRecord(createHeader(2, 'test', 0), 'b');
    const r3 = createRecord(createHeader(3, 'test', 0), 'c');

    writer.writeRecords(createBatch(0, [r1, r2]));
    writer.writeRecords(createBatch(1, [r3]));

    expect(writer.getBatches().map((batch) => batch.index)).toEqual([0, 1]);
    expect(writer.getRecords()).toEqual([r1, r2, r3]);
    expect(writer.getPayloads()).toEqual(['a', 'b', 'c']);
  });
});
