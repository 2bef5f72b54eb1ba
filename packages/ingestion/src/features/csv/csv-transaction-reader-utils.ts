import type { TransactionRecord } from '@txledger/core';
import { err, ok, type Result } from 'neverthrow';

import { SourceFormatError } from '../../errors.js';

export const REQUIRED_COLUMNS = ['type', 'client', 'tx'] as const;

/**
 * Position of each known column in a row, taken from the header.
 */
export interface ColumnLayout {
  type: number;
  client: number;
  tx: number;
  amount?: number | undefined;
}

/**
 * Resolve column positions from a header row. Names are matched
 * case-insensitively after trimming; unknown columns are ignored and the
 * first occurrence of a repeated name wins.
 *
 * @returns Column positions, or a SourceFormatError naming every missing required column
 */
export function resolveColumnLayout(header: readonly string[]): Result<ColumnLayout, SourceFormatError> {
  const positions = new Map<string, number>();
  header.forEach((name, index) => {
    const key = name.trim().toLowerCase();
    if (!positions.has(key)) {
      positions.set(key, index);
    }
  });

  const type = positions.get('type');
  const client = positions.get('client');
  const tx = positions.get('tx');

  if (type === undefined || client === undefined || tx === undefined) {
    const missing = REQUIRED_COLUMNS.filter((column) => !positions.has(column));
    return err(
      new SourceFormatError(`Missing required column(s): ${missing.join(', ')}`, {
        context: { header: [...header] },
      })
    );
  }

  return ok({ type, client, tx, amount: positions.get('amount') });
}

/**
 * Pick the known fields out of a row. Short rows leave trailing fields undefined.
 */
export function toTransactionRecord(row: readonly string[], layout: ColumnLayout): TransactionRecord {
  return {
    type: row[layout.type],
    client: row[layout.client],
    tx: row[layout.tx],
    amount: layout.amount === undefined ? undefined : row[layout.amount],
  };
}
