export { SourceError, SourceFormatError, SourceReadError } from './errors.js';
export { readCsvTransactions, type TransactionReadResult } from './features/csv/csv-transaction-reader.js';
export {
  REQUIRED_COLUMNS,
  resolveColumnLayout,
  toTransactionRecord,
  type ColumnLayout,
} from './features/csv/csv-transaction-reader-utils.js';
export { produceTransactions, type ProduceSummary } from './features/pipeline/transaction-producer.js';
export {
  runTransactionPipeline,
  type PipelineOptions,
  type PipelineResult,
} from './features/pipeline/transaction-pipeline.js';
