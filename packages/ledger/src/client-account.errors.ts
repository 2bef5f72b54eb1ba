import { DomainError, type ClientId, type TransactionId } from '@txledger/core';

export const REJECTION_REASONS = [
  'account_locked',
  'negative_amount',
  'duplicate_transaction',
  'insufficient_funds',
  'unknown_account',
  'unknown_transaction',
  'not_disputable',
  'already_disputed',
  'not_under_dispute',
  'balance_overflow',
] as const;

export type RejectionReason = (typeof REJECTION_REASONS)[number];

const reasonMessages: Record<RejectionReason, string> = {
  account_locked: 'account is locked',
  negative_amount: 'amount is negative',
  duplicate_transaction: 'transaction id was already used',
  insufficient_funds: 'insufficient available funds',
  unknown_account: 'client has no account',
  unknown_transaction: 'referenced transaction not found for client',
  not_disputable: 'only deposits can be disputed',
  already_disputed: 'transaction was already disputed',
  not_under_dispute: 'transaction is not under dispute',
  balance_overflow: 'balance would exceed the supported range',
};

/**
 * A well-formed transaction the ledger refused. The account is left untouched.
 */
export class TransactionRejectedError extends DomainError {
  readonly code = 'TRANSACTION_REJECTED';
  readonly severity = 'recoverable' as const;

  constructor(
    public readonly reason: RejectionReason,
    public readonly clientId: ClientId,
    public readonly txId: TransactionId
  ) {
    super(`Transaction ${String(txId)} for client ${String(clientId)} rejected: ${reasonMessages[reason]}`, {
      context: { clientId, reason, txId },
    });
  }
}
