export * from './errors/index.js';
export * from './schemas/transaction-record.js';
export * from './types/transaction.js';
export * from './value-objects/fixed-decimal.js';
