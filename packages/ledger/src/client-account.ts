import { FixedDecimal, type ClientId, type TransactionId } from '@txledger/core';
import { err, ok, type Result } from 'neverthrow';

import { TransactionRejectedError, type RejectionReason } from './client-account.errors.js';

/**
 * Dispute lifecycle of a ledger entry: none → disputed → resolved | charged_back.
 */
export type DisputeStatus = 'none' | 'disputed' | 'resolved' | 'charged_back';

export interface LedgerEntry {
  readonly kind: 'deposit' | 'withdrawal';
  readonly amount: FixedDecimal;
  readonly disputeStatus: DisputeStatus;
}

export interface AccountSnapshot {
  client: ClientId;
  available: FixedDecimal;
  held: FixedDecimal;
  total: FixedDecimal;
  locked: boolean;
}

/**
 * ClientAccount
 *
 * Balances and transaction history of a single client.
 *
 * Domain Rules:
 * - Only deposits and withdrawals that succeed are recorded in the ledger
 * - Withdrawals never take `available` below zero
 * - Only deposits can be disputed, and each at most once
 * - A chargeback locks the account for good; resolve and chargeback still settle while locked
 * - Any result outside the 64-bit amount range rejects the operation
 */
export class ClientAccount {
  private _available = FixedDecimal.ZERO;
  private _held = FixedDecimal.ZERO;
  private _locked = false;
  private readonly _ledger = new Map<TransactionId, LedgerEntry>();

  constructor(public readonly clientId: ClientId) {}

  get available(): FixedDecimal {
    return this._available;
  }

  get held(): FixedDecimal {
    return this._held;
  }

  get locked(): boolean {
    return this._locked;
  }

  total(): FixedDecimal {
    return this._available.add(this._held);
  }

  getLedgerEntry(txId: TransactionId): LedgerEntry | undefined {
    const entry = this._ledger.get(txId);
    return entry ? { ...entry } : undefined;
  }

  deposit(txId: TransactionId, amount: FixedDecimal): Result<void, TransactionRejectedError> {
    if (this._locked) return this.reject('account_locked', txId);
    if (amount.isNegative()) return this.reject('negative_amount', txId);
    if (this._ledger.has(txId)) return this.reject('duplicate_transaction', txId);

    return this.setBalances(txId, this._available.add(amount), this._held).map(() => {
      this._ledger.set(txId, { kind: 'deposit', amount, disputeStatus: 'none' });
    });
  }

  withdraw(txId: TransactionId, amount: FixedDecimal): Result<void, TransactionRejectedError> {
    if (this._locked) return this.reject('account_locked', txId);
    if (amount.isNegative()) return this.reject('negative_amount', txId);
    if (this._ledger.has(txId)) return this.reject('duplicate_transaction', txId);
    if (this._available.lessThan(amount)) return this.reject('insufficient_funds', txId);

    return this.setBalances(txId, this._available.subtract(amount), this._held).map(() => {
      this._ledger.set(txId, { kind: 'withdrawal', amount, disputeStatus: 'none' });
    });
  }

  /**
   * Move a deposit's amount from available to held. `available` may go
   * negative when the deposited funds were already withdrawn.
   */
  dispute(txId: TransactionId): Result<void, TransactionRejectedError> {
    if (this._locked) return this.reject('account_locked', txId);

    const entry = this._ledger.get(txId);
    if (!entry) return this.reject('unknown_transaction', txId);
    if (entry.kind === 'withdrawal') return this.reject('not_disputable', txId);
    if (entry.disputeStatus !== 'none') return this.reject('already_disputed', txId);

    return this.setBalances(txId, this._available.subtract(entry.amount), this._held.add(entry.amount)).map(() => {
      this._ledger.set(txId, { ...entry, disputeStatus: 'disputed' });
    });
  }

  resolve(txId: TransactionId): Result<void, TransactionRejectedError> {
    const entry = this._ledger.get(txId);
    if (!entry) return this.reject('unknown_transaction', txId);
    if (entry.disputeStatus !== 'disputed') return this.reject('not_under_dispute', txId);

    return this.setBalances(txId, this._available.add(entry.amount), this._held.subtract(entry.amount)).map(() => {
      this._ledger.set(txId, { ...entry, disputeStatus: 'resolved' });
    });
  }

  chargeback(txId: TransactionId): Result<void, TransactionRejectedError> {
    const entry = this._ledger.get(txId);
    if (!entry) return this.reject('unknown_transaction', txId);
    if (entry.disputeStatus !== 'disputed') return this.reject('not_under_dispute', txId);

    return this.setBalances(txId, this._available, this._held.subtract(entry.amount)).map(() => {
      this._ledger.set(txId, { ...entry, disputeStatus: 'charged_back' });
      this._locked = true;
    });
  }

  snapshot(): AccountSnapshot {
    return {
      client: this.clientId,
      available: this._available,
      held: this._held,
      total: this.total(),
      locked: this._locked,
    };
  }

  private setBalances(
    txId: TransactionId,
    available: FixedDecimal,
    held: FixedDecimal
  ): Result<void, TransactionRejectedError> {
    const total = available.add(held);
    if (!available.isWithinCapacity() || !held.isWithinCapacity() || !total.isWithinCapacity()) {
      return this.reject('balance_overflow', txId);
    }

    this._available = available;
    this._held = held;
    return ok(undefined);
  }

  private reject(reason: RejectionReason, txId: TransactionId): Result<void, TransactionRejectedError> {
    return err(new TransactionRejectedError(reason, this.clientId, txId));
  }
}
