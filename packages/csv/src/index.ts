export { CsvRecordMarshaller, DEFAULT_DELIMITER, DEFAULT_QUALIFIER } from './CsvRecordMarshaller.js';
export type { CsvRecordMarshallerOptions, FieldExtractor } from './CsvRecordMarshaller.js';
export { CsvRecordMapper } from './CsvRecordMapper.js';
export type { CsvRecordMapperOptions, CsvRow } from './CsvRecordMapper.js';
