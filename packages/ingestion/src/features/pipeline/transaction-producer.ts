import type { Transaction } from '@txledger/core';
import { getLogger } from '@txledger/logger';
import type { BoundedQueue } from '@txledger/queue';
import { err, ok, type Result } from 'neverthrow';

import { SourceError } from '../../errors.js';
import type { TransactionReadResult } from '../csv/csv-transaction-reader.js';

export interface ProduceSummary {
  produced: number;
  skipped: number;
}

/**
 * Push every parsed transaction into the queue, in source order.
 *
 * Malformed records are logged and skipped. A SourceError stops production
 * and is returned. The queue is closed on every exit path so the consumer
 * always drains and finishes.
 */
export async function produceTransactions(
  source: AsyncIterable<TransactionReadResult>,
  queue: BoundedQueue<Transaction>
): Promise<Result<ProduceSummary, SourceError>> {
  const logger = getLogger('TransactionProducer');
  const summary: ProduceSummary = { produced: 0, skipped: 0 };

  try {
    for await (const result of source) {
      if (result.isErr()) {
        const error = result.error;
        if (error instanceof SourceError) {
          return err(error);
        }
        summary.skipped++;
        logger.error({ issues: error.issues, line: error.line }, error.message);
        continue;
      }

      const pushed = await queue.push(result.value);
      if (pushed.isErr()) {
        logger.warn('Transaction queue closed early, stopping producer');
        break;
      }
      summary.produced++;
    }

    return ok(summary);
  } finally {
    queue.close();
  }
}
