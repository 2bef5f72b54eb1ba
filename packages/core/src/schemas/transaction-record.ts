import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { MalformedRecordError } from '../errors/index.js';
import {
  MAX_CLIENT_ID,
  MAX_TRANSACTION_ID,
  TRANSACTION_KINDS,
  type Transaction,
} from '../types/transaction.js';
import { FixedDecimal } from '../value-objects/fixed-decimal.js';

/**
 * One source row keyed by column name, values as read (untrimmed strings).
 */
export interface TransactionRecord {
  type?: string | undefined;
  client?: string | undefined;
  tx?: string | undefined;
  amount?: string | undefined;
}

function unsignedIdSchema(label: string, max: number) {
  return z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`)
    .regex(/^\d+$/, `${label} must be an unsigned integer`)
    .transform((val) => Number(val))
    .pipe(z.number().max(max, `${label} must be at most ${String(max)}`));
}

export const TransactionKindSchema = z
  .string({ required_error: 'type is required' })
  .trim()
  .toLowerCase()
  .pipe(
    z.enum(TRANSACTION_KINDS, {
      errorMap: () => ({ message: `type must be one of: ${TRANSACTION_KINDS.join(', ')}` }),
    })
  );

export const ClientIdSchema = unsignedIdSchema('client', MAX_CLIENT_ID);

export const TransactionIdSchema = unsignedIdSchema('tx', MAX_TRANSACTION_ID);

// Amounts are parsed (and rounded) here, once, at ingestion
export const TransactionRecordSchema = z
  .object({
    type: TransactionKindSchema,
    client: ClientIdSchema,
    tx: TransactionIdSchema,
    amount: z.string().optional(),
  })
  .transform((record, ctx): Transaction => {
    switch (record.type) {
      case 'deposit':
      case 'withdrawal': {
        const rawAmount = record.amount?.trim() ?? '';
        if (rawAmount === '') {
          ctx.addIssue({ code: 'custom', message: `amount is required for ${record.type}`, path: ['amount'] });
          return z.NEVER;
        }

        const amount = FixedDecimal.parse(rawAmount);
        if (amount.isErr()) {
          ctx.addIssue({ code: 'custom', message: amount.error.message, path: ['amount'] });
          return z.NEVER;
        }

        return { kind: record.type, clientId: record.client, txId: record.tx, amount: amount.value };
      }
      case 'dispute':
      case 'resolve':
      case 'chargeback':
        // Any amount on a dispute-family row is ignored
        return { kind: record.type, clientId: record.client, txId: record.tx };
    }
  });

/**
 * Validate one source row into a Transaction.
 *
 * @param line - 1-based source line, carried into the error for diagnostics
 */
export function parseTransactionRecord(
  record: TransactionRecord,
  line?: number
): Result<Transaction, MalformedRecordError> {
  const result = TransactionRecordSchema.safeParse(record);
  if (!result.success) {
    return err(
      new MalformedRecordError(
        result.error.issues.map((issue) => issue.message),
        line
      )
    );
  }
  return ok(result.data);
}
