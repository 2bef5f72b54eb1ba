import { DomainError } from '@txledger/core';

/**
 * No transaction stream can be produced from the input. Aborts the run.
 */
export abstract class SourceError extends DomainError {
  readonly severity = 'fatal' as const;
}

/**
 * The input could not be read (missing file, I/O failure).
 */
export class SourceReadError extends SourceError {
  readonly code = 'SOURCE_READ_ERROR';
}

/**
 * The input is readable but is not a transaction CSV: no header, required
 * columns missing, or structure the parser cannot recover from.
 */
export class SourceFormatError extends SourceError {
  readonly code = 'SOURCE_FORMAT_ERROR';
}
