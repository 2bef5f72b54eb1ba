import type { Transaction } from '@txledger/core';
import { DEFAULT_QUEUE_CAPACITY } from '@txledger/env';
import { LedgerEngine, type AccountSnapshot } from '@txledger/ledger';
import { getLogger } from '@txledger/logger';
import { BoundedQueue } from '@txledger/queue';
import { err, ok, type Result } from 'neverthrow';

import type { SourceError } from '../../errors.js';
import type { TransactionReadResult } from '../csv/csv-transaction-reader.js';

import { produceTransactions } from './transaction-producer.js';

export interface PipelineOptions {
  /**
   * Transactions buffered between reader and engine. Default: 100
   */
  queueCapacity?: number | undefined;
}

export interface PipelineResult {
  accounts: AccountSnapshot[];
  produced: number;
  skipped: number;
  applied: number;
  rejected: number;
}

/**
 * Feed a transaction source through a bounded queue into a fresh
 * LedgerEngine, with the producer and the consumer running concurrently.
 *
 * @returns Final account snapshots sorted by client id, or the SourceError that aborted the run
 */
export async function runTransactionPipeline(
  source: AsyncIterable<TransactionReadResult>,
  options: PipelineOptions = {}
): Promise<Result<PipelineResult, SourceError>> {
  const logger = getLogger('TransactionPipeline');
  const queue = new BoundedQueue<Transaction>({ capacity: options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY });
  const engine = new LedgerEngine();

  logger.debug({ queueCapacity: queue.capacity }, 'Starting transaction pipeline');

  const [produced, consumed] = await Promise.all([produceTransactions(source, queue), engine.consume(queue)]);

  if (produced.isErr()) {
    logger.error({ error: produced.error }, 'Transaction pipeline aborted');
    return err(produced.error);
  }

  const result: PipelineResult = {
    accounts: engine.snapshot(),
    ...produced.value,
    ...consumed,
  };

  logger.info(
    {
      accounts: result.accounts.length,
      applied: result.applied,
      produced: result.produced,
      rejected: result.rejected,
      skipped: result.skipped,
    },
    'Transaction pipeline completed'
  );

  return ok(result);
}
