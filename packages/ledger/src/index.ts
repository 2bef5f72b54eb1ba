export {
  ClientAccount,
  type AccountSnapshot,
  type DisputeStatus,
  type LedgerEntry,
} from './client-account.js';
export { REJECTION_REASONS, TransactionRejectedError, type RejectionReason } from './client-account.errors.js';
export { LedgerEngine, type ConsumeSummary } from './engine.js';
