import type { FixedDecimal } from '../value-objects/fixed-decimal.js';

/** Unsigned 16-bit client identifier. */
export type ClientId = number;

/** Unsigned 32-bit transaction identifier, unique across all clients. */
export type TransactionId = number;

export const MAX_CLIENT_ID = 0xffff;
export const MAX_TRANSACTION_ID = 0xffff_ffff;

export const TRANSACTION_KINDS = ['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback'] as const;

export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

interface TransactionBase {
  readonly clientId: ClientId;
  readonly txId: TransactionId;
}

export interface DepositTransaction extends TransactionBase {
  readonly kind: 'deposit';
  readonly amount: FixedDecimal;
}

export interface WithdrawalTransaction extends TransactionBase {
  readonly kind: 'withdrawal';
  readonly amount: FixedDecimal;
}

export interface DisputeTransaction extends TransactionBase {
  readonly kind: 'dispute';
}

export interface ResolveTransaction extends TransactionBase {
  readonly kind: 'resolve';
}

export interface ChargebackTransaction extends TransactionBase {
  readonly kind: 'chargeback';
}

/**
 * Funds movements: carry an amount and claim their transaction id.
 */
export type TransferTransaction = DepositTransaction | WithdrawalTransaction;

/**
 * Dispute-family operations: reference an earlier transfer by id, amount
 * comes from the account ledger.
 */
export type ClaimTransaction = DisputeTransaction | ResolveTransaction | ChargebackTransaction;

export type Transaction = TransferTransaction | ClaimTransaction;

export function isTransfer(tx: Transaction): tx is TransferTransaction {
  return tx.kind === 'deposit' || tx.kind === 'withdrawal';
}

export function isClaim(tx: Transaction): tx is ClaimTransaction {
  return !isTransfer(tx);
}

/**
 * Short human-readable form for log lines, e.g. "deposit tx=1 client=2 amount=1.5".
 */
export function describeTransaction(tx: Transaction): string {
  const base = `${tx.kind} tx=${String(tx.txId)} client=${String(tx.clientId)}`;
  return isTransfer(tx) ? `${base} amount=${tx.amount.format()}` : base;
}
