import type { Readable } from 'node:stream';

import { MalformedRecordError, parseTransactionRecord, type Transaction } from '@txledger/core';
import { CsvError, parse } from 'csv-parse';
import { err, type Result } from 'neverthrow';
import { z } from 'zod';

import { SourceFormatError, SourceReadError, type SourceError } from '../../errors.js';

import { resolveColumnLayout, toTransactionRecord, type ColumnLayout } from './csv-transaction-reader-utils.js';

export type TransactionReadResult = Result<Transaction, MalformedRecordError | SourceError>;

// Shape of each chunk csv-parse emits with `info: true`
const ParsedRowSchema = z.object({
  record: z.array(z.string()),
  info: z.object({ lines: z.number() }),
});

/**
 * Stream transactions from CSV input, one record at a time.
 *
 * The first row is the header. Each later row yields either a Transaction or
 * a MalformedRecordError. Unreadable input or CSV structure the parser cannot
 * continue from yields a single SourceError and ends the stream.
 */
export async function* readCsvTransactions(input: Readable): AsyncGenerator<TransactionReadResult, void, undefined> {
  const parser = parse({
    bom: true,
    info: true,
    relax_column_count: true,
    skip_empty_lines: true,
    skip_records_with_empty_values: true,
    skip_records_with_error: true,
    trim: true,
  });

  // Rows csv-parse dropped on its own. 'skip' fires while a whole chunk is
  // parsed, so each one waits until the records before it have been yielded.
  const skipped: MalformedRecordError[] = [];
  parser.on('skip', (error: CsvError) => {
    skipped.push(new MalformedRecordError([error.message], csvErrorLine(error)));
  });
  const skippedBefore = (line: number): MalformedRecordError[] => {
    const count = skipped.findIndex((error) => error.line !== undefined && error.line >= line);
    return skipped.splice(0, count === -1 ? skipped.length : count);
  };

  input.on('error', (error) => {
    parser.destroy(error);
  });
  input.pipe(parser);

  let layout: ColumnLayout | undefined;

  try {
    for await (const chunk of parser) {
      const row = ParsedRowSchema.safeParse(chunk);
      if (!row.success) {
        yield err(new SourceFormatError('Unexpected CSV parser output', { cause: row.error }));
        return;
      }
      const { record, info } = row.data;

      for (const error of skippedBefore(info.lines)) {
        yield err(error);
      }

      if (!layout) {
        const resolved = resolveColumnLayout(record);
        if (resolved.isErr()) {
          yield err(resolved.error);
          return;
        }
        layout = resolved.value;
        continue;
      }

      yield parseTransactionRecord(toTransactionRecord(record, layout), info.lines);
    }
  } catch (error) {
    yield err(toSourceError(error));
    return;
  }

  for (const error of skipped.splice(0)) {
    yield err(error);
  }

  if (!layout) {
    yield err(new SourceFormatError('Input has no header row'));
  }
}

function toSourceError(error: unknown): SourceError {
  if (error instanceof CsvError) {
    return new SourceFormatError(`Invalid CSV: ${error.message}`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SourceReadError(`Failed to read input: ${message}`, { cause: error });
}

function csvErrorLine(error: CsvError): number | undefined {
  const lines: unknown = error['lines'];
  return typeof lines === 'number' ? lines : undefined;
}
