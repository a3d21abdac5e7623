// Job source
export { CsvJobSource } from './infrastructure/sources/CsvJobSource.js';
export type { CsvJobSourceOptions } from './infrastructure/sources/CsvJobSource.js';
export { parseCsv, detectDelimiter } from './infrastructure/parsers/CsvParser.js';
export type { CsvParserOptions } from './infrastructure/parsers/CsvParser.js';

// Validation
export { requiredFields, fieldPattern, composeValidators } from './domain/validators.js';

// Reporting
export { CsvReportWriter, formatStamp } from './infrastructure/reporting/CsvReportWriter.js';
export type {
  CsvReportWriterOptions,
  ResultRow,
  ResultStatus,
  WrittenReports,
} from './infrastructure/reporting/CsvReportWriter.js';
