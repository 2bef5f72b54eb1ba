import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';

import { DomainError } from '@txledger/core';
import {
  readCsvTransactions,
  runTransactionPipeline,
  type PipelineResult,
  type SourceError,
} from '@txledger/ingestion';
import { getLogger } from '@txledger/logger';
import { err, type Result } from 'neverthrow';

const logger = getLogger('ProcessHandler');

/**
 * The input path does not name an existing file.
 */
export class InputNotFoundError extends DomainError {
  readonly code = 'INPUT_NOT_FOUND';
  readonly severity = 'fatal' as const;

  constructor(public readonly inputPath: string) {
    super(`Input file not found: ${inputPath}`, { context: { inputPath } });
  }
}

export type ProcessError = InputNotFoundError | SourceError;

/**
 * Process handler parameters
 */
export interface ProcessHandlerParams {
  /** Path of the transactions CSV */
  inputPath: string;

  /** Transactions buffered between reader and engine */
  queueCapacity: number;
}

/**
 * Process handler - runs one input file through the transaction pipeline.
 * Reusable by both CLI command and tests.
 */
export class ProcessHandler {
  async execute(params: ProcessHandlerParams): Promise<Result<PipelineResult, ProcessError>> {
    const { inputPath, queueCapacity } = params;

    const found = await stat(inputPath).then(
      (stats) => stats.isFile(),
      () => false
    );
    if (!found) {
      return err(new InputNotFoundError(inputPath));
    }

    logger.info({ inputPath, queueCapacity }, 'Processing transactions');

    const input = createReadStream(inputPath, { encoding: 'utf8' });
    return runTransactionPipeline(readCsvTransactions(input), { queueCapacity });
  }
}
