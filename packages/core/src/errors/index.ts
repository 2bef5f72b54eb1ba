/**
 * Error hierarchy shared by the ingestion pipeline and the ledger.
 *
 * Errors are returned through neverthrow `Result`s rather than thrown.
 * `severity` tells the caller whether the run can continue:
 * - `recoverable`: log it, skip the record or transaction, keep going
 * - `fatal`: no transaction stream can be produced, abort the run
 */
export type ErrorSeverity = 'recoverable' | 'fatal';

export interface DomainErrorOptions {
  context?: Record<string, unknown> | undefined;
  cause?: unknown;
}

export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;

  readonly timestamp: string;
  readonly context: Record<string, unknown> | undefined;

  constructor(message: string, options?: DomainErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.timestamp = new Date().toISOString();
    this.context = options?.context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * A string that is not a valid fixed-point amount.
 */
export class FixedDecimalParseError extends DomainError {
  readonly code = 'INVALID_AMOUNT';
  readonly severity = 'recoverable' as const;

  constructor(
    public readonly input: string,
    reason: string
  ) {
    super(`Invalid amount '${input}': ${reason}`, { context: { input } });
  }
}

/**
 * A source record that cannot be turned into a Transaction.
 */
export class MalformedRecordError extends DomainError {
  readonly code = 'MALFORMED_RECORD';
  readonly severity = 'recoverable' as const;

  constructor(
    public readonly issues: string[],
    public readonly line?: number | undefined
  ) {
    super(`Malformed record${line === undefined ? '' : ` at line ${String(line)}`}: ${issues.join('; ')}`, {
      context: { issues, line },
    });
  }
}
