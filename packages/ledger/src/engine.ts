import {
  describeTransaction,
  type ClaimTransaction,
  type ClientId,
  type Transaction,
  type TransactionId,
  type TransferTransaction,
} from '@txledger/core';
import { getLogger } from '@txledger/logger';
import { err, type Result } from 'neverthrow';

import { ClientAccount, type AccountSnapshot } from './client-account.js';
import { TransactionRejectedError } from './client-account.errors.js';

export interface ConsumeSummary {
  applied: number;
  rejected: number;
}

/**
 * Routes transactions to client accounts in arrival order.
 *
 * Deposit and withdrawal ids are global: an id is claimed the first time it
 * is seen, even when the operation is then rejected, and any later transfer
 * reusing it is a duplicate. Accounts come into existence on their first
 * successful transfer.
 */
export class LedgerEngine {
  private readonly logger = getLogger('LedgerEngine');
  private readonly accounts = new Map<ClientId, ClientAccount>();
  private readonly claimedTxIds = new Set<TransactionId>();

  get accountCount(): number {
    return this.accounts.size;
  }

  getAccount(clientId: ClientId): ClientAccount | undefined {
    return this.accounts.get(clientId);
  }

  apply(tx: Transaction): Result<void, TransactionRejectedError> {
    switch (tx.kind) {
      case 'deposit':
      case 'withdrawal':
        return this.applyTransfer(tx);
      case 'dispute':
      case 'resolve':
      case 'chargeback':
        return this.applyClaim(tx);
      default: {
        // TypeScript exhaustiveness check
        const _exhaustive: never = tx;
        return _exhaustive;
      }
    }
  }

  /**
   * Apply every transaction from the source in order. Rejections are logged
   * and counted; they never stop the run.
   */
  async consume(source: AsyncIterable<Transaction>): Promise<ConsumeSummary> {
    const summary: ConsumeSummary = { applied: 0, rejected: 0 };

    for await (const tx of source) {
      const result = this.apply(tx);
      if (result.isErr()) {
        summary.rejected++;
        const { reason, clientId, txId } = result.error;
        this.logger.error({ reason, clientId, txId }, result.error.message);
      } else {
        summary.applied++;
        if (this.logger.isLevelEnabled('trace')) {
          this.logger.trace(`Applied ${describeTransaction(tx)}`);
        }
      }
    }

    return summary;
  }

  /**
   * One snapshot per account, ascending by client id.
   */
  snapshot(): AccountSnapshot[] {
    return [...this.accounts.values()]
      .sort((a, b) => a.clientId - b.clientId)
      .map((account) => account.snapshot());
  }

  private applyTransfer(tx: TransferTransaction): Result<void, TransactionRejectedError> {
    if (this.claimedTxIds.has(tx.txId)) {
      return err(new TransactionRejectedError('duplicate_transaction', tx.clientId, tx.txId));
    }
    this.claimedTxIds.add(tx.txId);

    const existing = this.accounts.get(tx.clientId);
    const account = existing ?? new ClientAccount(tx.clientId);
    const result = tx.kind === 'deposit' ? account.deposit(tx.txId, tx.amount) : account.withdraw(tx.txId, tx.amount);

    if (result.isOk() && !existing) {
      this.accounts.set(tx.clientId, account);
    }
    return result;
  }

  private applyClaim(tx: ClaimTransaction): Result<void, TransactionRejectedError> {
    const account = this.accounts.get(tx.clientId);
    if (!account) {
      return err(new TransactionRejectedError('unknown_account', tx.clientId, tx.txId));
    }

    switch (tx.kind) {
      case 'dispute':
        return account.dispute(tx.txId);
      case 'resolve':
        return account.resolve(tx.txId);
      case 'chargeback':
        return account.chargeback(tx.txId);
      default: {
        // TypeScript exhaustiveness check
        const _exhaustive: never = tx;
        return _exhaustive;
      }
    }
  }
}
