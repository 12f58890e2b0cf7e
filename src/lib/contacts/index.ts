export {
  parseCsv,
  parseContactsCsv,
  extractContactRows,
  outcomesToCsv,
  RESULT_COLUMNS,
  type ParsedSheet,
  type ContactsFile,
} from './csv';
export {
  analyzeColumnContent,
  detectColumns,
  resolveColumns,
  type ColumnDetection,
  type ColumnMapping,
  type ColumnOverrides,
  type ContentAnalysis,
  type FieldMatch,
} from './columns';
export { filterContactRows, type RawContactRow, type SkippedRow, type FilteredContacts } from './rows';
